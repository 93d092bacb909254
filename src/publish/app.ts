/**
 * Pin-then-publish workflow
 */

import type { EngineContext } from "#/core";
import type { AppDescriptor, EngineConfig } from "#/schemas";
import { createRegistryProvider } from "#/registry";
import { createDigestResolver, pinServiceImages } from "#/pinning";
import { publishBundle } from "./publisher";
import type { PublishResult } from "./publish.types";

export interface CreateAppOptions {
  signal?: AbortSignal;
}

/**
 * Pin every service image in `descriptor`, then publish the bundle as `target`.
 * Bundle root, bundle kind and resolver strategy come from `config`.
 *
 * The descriptor is mutated by pinning and stays pinned if publishing fails.
 */
export async function createApp(
  ctx: EngineContext,
  config: EngineConfig,
  descriptor: AppDescriptor,
  target: string,
  options: CreateAppOptions = {}
): Promise<PublishResult> {
  const registries = createRegistryProvider(config, ctx.http, ctx.tokens);
  const resolver = createDigestResolver(config, ctx.http, registries);

  await pinServiceImages(descriptor, resolver, {
    onProgress: ctx.onProgress,
    logger: ctx.logger,
    signal: options.signal,
  });

  const result = await publishBundle(
    { fs: ctx.fs, registries, logger: ctx.logger, onProgress: ctx.onProgress },
    descriptor,
    target,
    { bundleRoot: config.bundleRoot, kind: config.kind, signal: options.signal }
  );

  ctx.logger.info("Published app bundle", { reference: result.reference, digest: result.manifestDigest });
  return result;
}
