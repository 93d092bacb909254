/**
 * Registry module
 *
 * Resolves registry domains to clients and hands out repositories.
 */

// Types
export * from "./registry.types";

// Resolver (config → ResolvedRegistry)
export { resolveRegistry, getApiHost, isLoopbackDomain } from "./resolver";

// Factory (client creation)
export { createRegistryClient, createRegistryProvider } from "./factory";

export { OciRepository } from "./repository";
