import { describe, test, expect } from "vitest";
import { EngineClient } from "./engine-client";
import { createMockHttpClient, jsonResponse } from "#/test-utils/mocks";

const DIGEST = `sha256:${"a".repeat(64)}`;
const INSPECT_URL = "http://localhost:2375/distribution/docker.io%2Flibrary%2Fnginx%3Astable/json";

describe("EngineClient", () => {
  const createClient = (host = "http://localhost:2375/") => {
    const http = createMockHttpClient();
    return { client: new EngineClient({ host }, http), http };
  };

  test("returns the digest and platforms reported by the engine", async () => {
    const { client, http } = createClient();
    http.responses.set(
      INSPECT_URL,
      jsonResponse({
        Descriptor: { mediaType: "application/vnd.oci.image.index.v1+json", digest: DIGEST, size: 1024 },
        Platforms: [
          { architecture: "amd64", os: "linux" },
          { architecture: "arm", os: "linux", variant: "v7" },
        ],
      })
    );

    const result = await client.inspectDistribution("docker.io/library/nginx:stable");

    expect(result).toEqual({
      success: true,
      digest: DIGEST,
      platforms: [
        { architecture: "amd64", os: "linux" },
        { architecture: "arm", os: "linux", variant: "v7" },
      ],
    });
  });

  test("treats a missing platform list as empty", async () => {
    const { client, http } = createClient();
    http.responses.set(INSPECT_URL, jsonResponse({ Descriptor: { digest: DIGEST } }));

    const result = await client.inspectDistribution("docker.io/library/nginx:stable");

    expect(result.platforms).toEqual([]);
  });

  test("surfaces the engine's error message", async () => {
    const { client, http } = createClient();
    http.responses.set(INSPECT_URL, jsonResponse({ message: "manifest unknown" }, 404));

    const result = await client.inspectDistribution("docker.io/library/nginx:stable");

    expect(result).toEqual({
      success: false,
      error: "Engine failed to inspect docker.io/library/nginx:stable: 404 manifest unknown",
    });
  });

  test("rejects responses without a descriptor digest", async () => {
    const { client, http } = createClient();
    http.responses.set(INSPECT_URL, jsonResponse({ Platforms: [] }));

    const result = await client.inspectDistribution("docker.io/library/nginx:stable");

    expect(result).toEqual({
      success: false,
      error: "Unexpected engine response for docker.io/library/nginx:stable",
    });
  });

  test("reports an unreachable engine", async () => {
    const { client, http } = createClient();
    http.fetch = async () => {
      throw new Error("connect ECONNREFUSED");
    };

    const result = await client.inspectDistribution("docker.io/library/nginx:stable");

    expect(result).toEqual({ success: false, error: "Failed to reach engine: connect ECONNREFUSED" });
  });
});
