/**
 * compose-app-bundler
 *
 * Pins compose service images to digests and publishes the app as an
 * OCI artifact. Portable, testable, dependency-injected.
 */

// Core interfaces and errors
export * from '#/core';

// Schemas (Zod validation)
export * from '#/schemas';

// Configuration (.composeapp.yaml)
export * from '#/config';

// Logging
export * from '#/logger';

// Formatters (pure utilities)
export * from '#/formatters';

// Image references
export * from '#/reference';

// App descriptor (docker-compose.yml)
export * from '#/descriptor';

// OCI Distribution Spec
export * from '#/oci';

// Registry (resolution, clients)
export * from '#/registry';

// Container engine
export * from '#/engine';

// Pinning (tag → digest)
export * from '#/pinning';

// Bundle archive
export * from '#/archive';

// Publishing
export * from '#/publish';
