import { describe, test, expect } from "vitest";
import { pinServiceImages } from "./pinner";
import { createEngineResolver, createRegistryResolver } from "./resolvers";
import type { DigestResolver } from "./pinning.types";
import { ImageReferenceError, ResolutionError } from "#/core";
import { parseAppDescriptor } from "#/descriptor";
import { createRegistryProvider } from "#/registry";
import { EngineClient } from "#/engine";
import { MANIFEST_MEDIA_TYPES } from "#/oci";
import {
  createEventRecorder,
  createMockHttpClient,
  createMockLogger,
  emptyResponse,
  jsonResponse,
} from "#/test-utils/mocks";

const DIGEST = `sha256:${"a".repeat(64)}`;
const NGINX = "https://registry-1.docker.io/v2/library/nginx";

const platformList = {
  schemaVersion: 2,
  mediaType: MANIFEST_MEDIA_TYPES.ociIndex,
  manifests: [
    {
      mediaType: MANIFEST_MEDIA_TYPES.ociManifest,
      digest: `sha256:${"1".repeat(64)}`,
      size: 10,
      platform: { architecture: "amd64", os: "linux" },
    },
    {
      mediaType: MANIFEST_MEDIA_TYPES.ociManifest,
      digest: `sha256:${"2".repeat(64)}`,
      size: 10,
      platform: { architecture: "arm", os: "linux", variant: "v7" },
    },
  ],
};

function registrySetup(manifest: unknown = platformList) {
  const http = createMockHttpClient();
  http.responses.set(`HEAD ${NGINX}/manifests/stable`, emptyResponse(200, { "Docker-Content-Digest": DIGEST }));
  http.responses.set(`GET ${NGINX}/manifests/${DIGEST}`, () => jsonResponse(manifest));
  return { http, resolver: createRegistryResolver(createRegistryProvider(null, http)) };
}

// Resolves every image to a fixed digest, failing for images listed in `failing`
function fakeResolver(failing: string[] = []): DigestResolver & { seen: string[] } {
  const seen: string[] = [];
  return {
    seen,
    async resolve(ref) {
      seen.push(ref.path);
      if (failing.includes(ref.path)) {
        throw new ResolutionError(`Unable to resolve ${ref.path}`);
      }
      return { digest: DIGEST, platforms: [] };
    },
  };
}

describe("pinServiceImages", () => {
  test("pins a tagged image through the registry", async () => {
    const { resolver } = registrySetup();
    const descriptor = parseAppDescriptor({ services: { web: { image: "nginx:stable" } } });

    await pinServiceImages(descriptor, resolver);

    expect(descriptor.services.web?.image).toBe(`docker.io/library/nginx@${DIGEST}`);
  });

  test("reports platforms in manifest order", async () => {
    const { resolver } = registrySetup();
    const descriptor = parseAppDescriptor({ services: { web: { image: "nginx:stable" } } });
    const { events, listener } = createEventRecorder();

    await pinServiceImages(descriptor, resolver, { onProgress: listener });

    expect(events).toEqual([
      { type: "pin-started", service: "web", image: "nginx:stable" },
      {
        type: "service-pinned",
        service: "web",
        image: "nginx:stable",
        platforms: [
          { architecture: "amd64", os: "linux" },
          { architecture: "arm", os: "linux", variant: "v7" },
        ],
        pinned: `docker.io/library/nginx@${DIGEST}`,
      },
    ]);
  });

  test("single-platform images enumerate no platforms", async () => {
    const { resolver } = registrySetup({
      schemaVersion: 2,
      mediaType: MANIFEST_MEDIA_TYPES.dockerManifest,
      config: { mediaType: "application/vnd.docker.container.image.v1+json", digest: DIGEST, size: 10 },
      layers: [],
    });
    const descriptor = parseAppDescriptor({ services: { web: { image: "nginx:stable" } } });
    const { events, listener } = createEventRecorder();

    await pinServiceImages(descriptor, resolver, { onProgress: listener });

    const pinned = events.find((e) => e.type === "service-pinned");
    expect(pinned?.type === "service-pinned" && pinned.platforms).toEqual([]);
  });

  test("keeps domain and path while replacing the tag with the digest", async () => {
    const descriptor = parseAppDescriptor({
      services: { api: { image: "localhost:5000/team/api:1.2.3" } },
    });

    await pinServiceImages(descriptor, fakeResolver());

    expect(descriptor.services.api?.image).toBe(`localhost:5000/team/api@${DIGEST}`);
  });

  test("leaves other service fields untouched", async () => {
    const descriptor = parseAppDescriptor({
      services: { web: { image: "nginx:stable", ports: ["8080:80"] } },
    });

    await pinServiceImages(descriptor, fakeResolver());

    expect(descriptor.services.web).toEqual({ image: `docker.io/library/nginx@${DIGEST}`, ports: ["8080:80"] });
  });

  test("expands default-valued placeholders", async () => {
    const descriptor = parseAppDescriptor({ services: { web: { image: "${IMAGE-nginx:stable}" } } });

    await pinServiceImages(descriptor, fakeResolver());

    expect(descriptor.services.web?.image).toBe(`docker.io/library/nginx@${DIGEST}`);
  });

  test("rejects untagged images", async () => {
    const descriptor = parseAppDescriptor({ services: { web: { image: "nginx" } } });

    await expect(pinServiceImages(descriptor, fakeResolver())).rejects.toThrow(
      new ImageReferenceError("nginx", "Invalid image reference(nginx): Images must be tagged. e.g nginx:stable")
    );
  });

  test("rejects unparsable images", async () => {
    const descriptor = parseAppDescriptor({ services: { web: { image: "Nginx:stable" } } });

    await expect(pinServiceImages(descriptor, fakeResolver())).rejects.toBeInstanceOf(ImageReferenceError);
  });

  test("keeps earlier pins when a later service fails", async () => {
    const descriptor = parseAppDescriptor({
      services: {
        a: { image: "team/a:1" },
        b: { image: "team/b:1" },
        c: { image: "team/c:1" },
      },
    });
    const resolver = fakeResolver(["team/b"]);

    await expect(pinServiceImages(descriptor, resolver)).rejects.toBeInstanceOf(ResolutionError);

    expect(descriptor.services.a?.image).toBe(`docker.io/team/a@${DIGEST}`);
    expect(descriptor.services.b?.image).toBe("team/b:1");
    expect(descriptor.services.c?.image).toBe("team/c:1");
    expect(resolver.seen).toEqual(["team/a", "team/b"]);
  });

  test("logs each resolution at debug level", async () => {
    const descriptor = parseAppDescriptor({ services: { web: { image: "nginx:stable" } } });
    const logger = createMockLogger();

    await pinServiceImages(descriptor, fakeResolver(), { logger });

    expect(logger.lines).toEqual([
      {
        level: "debug",
        message: "Resolving image digest",
        meta: { service: "web", image: "docker.io/library/nginx:stable" },
      },
    ]);
  });
});

describe("createRegistryResolver", () => {
  test("fails with ResolutionError for unknown tags", async () => {
    const { resolver } = registrySetup();

    await expect(
      resolver.resolve({ domain: "docker.io", path: "library/nginx", tag: "missing" })
    ).rejects.toThrow("Unable to resolve docker.io/library/nginx:missing: Manifest unknown: library/nginx:missing");
  });

  test("fails with ResolutionError for unknown manifest media types", async () => {
    const { resolver } = registrySetup({
      schemaVersion: 1,
      mediaType: "application/vnd.docker.distribution.manifest.v1+json",
    });

    await expect(
      resolver.resolve({ domain: "docker.io", path: "library/nginx", tag: "stable" })
    ).rejects.toThrow(
      new ResolutionError(
        "Unable to fetch manifest for docker.io/library/nginx:stable: Unexpected manifest media type: application/vnd.docker.distribution.manifest.v1+json"
      )
    );
  });

  test("does not touch the network once aborted", async () => {
    const { http, resolver } = registrySetup();
    const controller = new AbortController();
    controller.abort();

    await expect(
      resolver.resolve({ domain: "docker.io", path: "library/nginx", tag: "stable" }, { signal: controller.signal })
    ).rejects.toThrow("This operation was aborted");
    expect(http.calls).toHaveLength(0);
  });
});

describe("createEngineResolver", () => {
  test("uses the digest and platforms reported by the engine", async () => {
    const http = createMockHttpClient();
    http.responses.set(
      "http://localhost:2375/distribution/docker.io%2Flibrary%2Fnginx%3Astable/json",
      jsonResponse({ Descriptor: { digest: DIGEST }, Platforms: [{ architecture: "arm64", os: "linux" }] })
    );
    const resolver = createEngineResolver(new EngineClient({ host: "http://localhost:2375" }, http));

    const resolved = await resolver.resolve({ domain: "docker.io", path: "library/nginx", tag: "stable" });

    expect(resolved).toEqual({ digest: DIGEST, platforms: [{ architecture: "arm64", os: "linux" }] });
  });

  test("wraps engine failures in ResolutionError", async () => {
    const http = createMockHttpClient();
    const resolver = createEngineResolver(new EngineClient({ host: "http://localhost:2375" }, http));

    await expect(
      resolver.resolve({ domain: "docker.io", path: "library/nginx", tag: "stable" })
    ).rejects.toBeInstanceOf(ResolutionError);
  });
});
