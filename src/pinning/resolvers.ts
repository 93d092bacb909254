/**
 * Digest resolvers
 *
 * Two interchangeable ways to pin a tag: ask a local engine, or walk the
 * registry (tag → descriptor → manifest) ourselves.
 */

import { ResolutionError, type HttpClient } from "#/core";
import { formatImageReference, type TaggedImageReference } from "#/reference";
import { manifestPlatforms, type RequestOptions } from "#/oci";
import type { RegistryProvider } from "#/registry";
import { EngineClient } from "#/engine";
import type { EngineConfig } from "#/schemas";
import type { DigestResolver, ResolvedDigest } from "./pinning.types";

/**
 * Resolve through the Distribution API.
 */
export function createRegistryResolver(registries: RegistryProvider): DigestResolver {
  return {
    async resolve(ref: TaggedImageReference, options: RequestOptions = {}): Promise<ResolvedDigest> {
      const image = formatImageReference(ref);
      const repository = registries.getRepository(ref);

      options.signal?.throwIfAborted();
      const tag = await repository.getTagDescriptor(ref.tag, options);
      if (!tag.success || !tag.descriptor) {
        throw new ResolutionError(`Unable to resolve ${image}: ${tag.error ?? "no descriptor returned"}`);
      }

      options.signal?.throwIfAborted();
      const manifest = await repository.getManifest(tag.descriptor.digest, options);
      if (!manifest.success || !manifest.manifest) {
        throw new ResolutionError(
          `Unable to fetch manifest for ${image}: ${manifest.error ?? "no manifest returned"}`
        );
      }

      return { digest: tag.descriptor.digest, platforms: manifestPlatforms(manifest.manifest) };
    },
  };
}

/**
 * Resolve through a local engine's distribution inspection.
 */
export function createEngineResolver(engine: EngineClient): DigestResolver {
  return {
    async resolve(ref: TaggedImageReference, options: RequestOptions = {}): Promise<ResolvedDigest> {
      const image = formatImageReference(ref);

      options.signal?.throwIfAborted();
      const result = await engine.inspectDistribution(image, options);
      if (!result.success || !result.digest) {
        throw new ResolutionError(`Unable to resolve ${image}: ${result.error ?? "no digest returned"}`);
      }

      return { digest: result.digest, platforms: result.platforms ?? [] };
    },
  };
}

/**
 * Pick the resolver the engine config asks for.
 */
export function createDigestResolver(
  config: EngineConfig,
  http: HttpClient,
  registries: RegistryProvider
): DigestResolver {
  switch (config.strategy) {
    case "engine":
      return createEngineResolver(new EngineClient({ host: config.engineHost }, http));
    case "registry":
      return createRegistryResolver(registries);
  }
}
