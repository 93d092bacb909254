import { describe, test, expect } from "vitest";
import { getApiHost, isLoopbackDomain, resolveRegistry } from "./resolver";
import { createMockTokenProvider } from "#/test-utils/mocks";
import { EngineConfigSchema } from "#/schemas";

describe("getApiHost", () => {
  test("maps docker.io to the Docker Hub API host", () => {
    expect(getApiHost("docker.io")).toBe("registry-1.docker.io");
  });

  test("keeps other domains as they are", () => {
    expect(getApiHost("ghcr.io")).toBe("ghcr.io");
    expect(getApiHost("localhost:5000")).toBe("localhost:5000");
  });
});

describe("isLoopbackDomain", () => {
  test.each([
    ["localhost", true],
    ["localhost:5000", true],
    ["127.0.0.1:5000", true],
    ["ghcr.io", false],
    ["registry.local:5000", false],
  ])("%s → %s", (domain, expected) => {
    expect(isLoopbackDomain(domain)).toBe(expected);
  });
});

describe("resolveRegistry", () => {
  test("returns anonymous https registry without config", () => {
    expect(resolveRegistry("ghcr.io", null)).toEqual({
      domain: "ghcr.io",
      apiHost: "ghcr.io",
      insecure: false,
    });
  });

  test("uses credentials from config", () => {
    const config = EngineConfigSchema.parse({
      registries: { "ghcr.io": { username: "ci", token: "test-secret" } },
    });

    expect(resolveRegistry("ghcr.io", config)).toEqual({
      domain: "ghcr.io",
      apiHost: "ghcr.io",
      username: "ci",
      token: "test-secret",
      insecure: false,
    });
  });

  test("falls back to the token provider", () => {
    const tokens = createMockTokenProvider({
      "docker.io": { username: "bot", token: "env-token" },
    });

    const registry = resolveRegistry("docker.io", null, tokens);

    expect(registry.apiHost).toBe("registry-1.docker.io");
    expect(registry.username).toBe("bot");
    expect(registry.token).toBe("env-token");
  });

  test("config token wins over the token provider", () => {
    const config = EngineConfigSchema.parse({
      registries: { "ghcr.io": { token: "config-token" } },
    });
    const tokens = createMockTokenProvider({ "ghcr.io": { token: "env-token" } });

    expect(resolveRegistry("ghcr.io", config, tokens).token).toBe("config-token");
  });

  test("treats unconfigured loopback registries as insecure", () => {
    expect(resolveRegistry("localhost:5000", null).insecure).toBe(true);
  });

  test("respects the configured insecure flag", () => {
    const config = EngineConfigSchema.parse({
      registries: { "registry.local:5000": { insecure: true } },
    });

    expect(resolveRegistry("registry.local:5000", config).insecure).toBe(true);
  });
});
