import { describe, test, expect } from "vitest";
import { createRegistryProvider } from "./factory";
import { OciRepository } from "./repository";
import { createMockHttpClient, emptyResponse } from "#/test-utils/mocks";
import { parseImageReference } from "#/reference";

const DIGEST = `sha256:${"b".repeat(64)}`;

describe("factory", () => {
  describe("createRegistryProvider", () => {
    test("returns an OciRepository named after domain and path", () => {
      const provider = createRegistryProvider(null, createMockHttpClient());

      const repo = provider.getRepository(parseImageReference("nginx:stable"));

      expect(repo).toBeInstanceOf(OciRepository);
      expect(repo.reference).toBe("docker.io/library/nginx");
    });

    test("talks to the Docker Hub API host for docker.io images", async () => {
      const http = createMockHttpClient(
        new Map([
          [
            "HEAD https://registry-1.docker.io/v2/library/nginx/manifests/stable",
            emptyResponse(200, { "Docker-Content-Digest": DIGEST }),
          ],
        ])
      );
      const provider = createRegistryProvider(null, http);

      const result = await provider
        .getRepository(parseImageReference("nginx:stable"))
        .getTagDescriptor("stable");

      expect(result.success).toBe(true);
      expect(result.descriptor?.digest).toBe(DIGEST);
    });

    test("uses plain http for loopback registries", async () => {
      const http = createMockHttpClient();
      const provider = createRegistryProvider(null, http);

      await provider.getRepository(parseImageReference("localhost:5000/app:dev")).getTagDescriptor("dev");

      expect(http.calls[0]?.url).toBe("http://localhost:5000/v2/app/manifests/dev");
    });
  });
});
