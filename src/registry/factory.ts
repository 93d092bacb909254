/**
 * Registry provider factory
 *
 * Single decision point for creating registry clients.
 * One OciClient per domain, so token exchanges are shared across repositories.
 */

import type { HttpClient, TokenProvider } from "#/core";
import { OciClient } from "#/oci";
import type { ImageReference } from "#/reference";
import type { EngineConfig, RegistryProvider, RegistryRepository, ResolvedRegistry } from "./registry.types";
import { resolveRegistry } from "./resolver";
import { OciRepository } from "./repository";

/**
 * Create an OCI client for the resolved registry
 */
export function createRegistryClient(registry: ResolvedRegistry, http: HttpClient): OciClient {
  return new OciClient(
    {
      host: registry.apiHost,
      username: registry.username,
      token: registry.token,
      insecure: registry.insecure,
    },
    http
  );
}

/**
 * Create a provider that hands out repositories for image references
 */
export function createRegistryProvider(
  config: EngineConfig | null,
  http: HttpClient,
  tokens?: TokenProvider
): RegistryProvider {
  const clients = new Map<string, OciClient>();

  const clientFor = (domain: string): OciClient => {
    let client = clients.get(domain);
    if (!client) {
      client = createRegistryClient(resolveRegistry(domain, config, tokens), http);
      clients.set(domain, client);
    }
    return client;
  };

  return {
    getRepository(ref: ImageReference): RegistryRepository {
      return new OciRepository(clientFor(ref.domain), ref.domain, ref.path);
    },
  };
}
