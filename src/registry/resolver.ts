/**
 * Registry resolver
 *
 * Normalizes config to ResolvedRegistry.
 * Parse once, never parse again - downstream code only sees ResolvedRegistry.
 */

import type { TokenProvider } from "#/core";
import type { EngineConfig, ResolvedRegistry } from "./registry.types";
import { DEFAULT_DOMAIN, DEFAULT_REGISTRY_API_HOST } from "#/constants";

/**
 * Get the Distribution API host for a reference domain.
 *
 * @example
 * getApiHost("docker.io") → "registry-1.docker.io"
 * getApiHost("ghcr.io") → "ghcr.io"
 */
export function getApiHost(domain: string): string {
  return domain === DEFAULT_DOMAIN ? DEFAULT_REGISTRY_API_HOST : domain;
}

/**
 * Loopback registries without a config entry are served over plain http.
 */
export function isLoopbackDomain(domain: string): boolean {
  const host = domain.replace(/:\d+$/, "");
  return host === "localhost" || host === "127.0.0.1";
}

/**
 * Resolve a domain to a registry configuration
 *
 * Token priority:
 * 1. Config entry token
 * 2. TokenProvider (for env vars like REGISTRY_TOKEN)
 */
export function resolveRegistry(
  domain: string,
  config: EngineConfig | null,
  tokens?: TokenProvider
): ResolvedRegistry {
  const entry = config?.registries[domain];

  const token = entry?.token ?? tokens?.getRegistryToken(domain);
  const username = entry?.username ?? tokens?.getRegistryUsername(domain);

  return {
    domain,
    apiHost: getApiHost(domain),
    ...(username ? { username } : {}),
    ...(token ? { token } : {}),
    insecure: entry ? entry.insecure : isLoopbackDomain(domain),
  };
}
