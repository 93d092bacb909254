/**
 * Bundle publisher
 *
 * descriptor → YAML → tar+gzip → blob → manifest → tag.
 * Nothing is rolled back: a failed manifest push leaves the uploaded blobs
 * on the registry, unreferenced.
 */

import { ImageReferenceError, PublishError } from "#/core";
import { buildArchive } from "#/archive";
import { serializeAppDescriptor } from "#/descriptor";
import { formatImageReference, parseImageReference, withTagOrDefault } from "#/reference";
import {
  BUNDLE_FORMAT_VERSION,
  BUNDLE_KINDS,
  BUNDLE_MEDIA_TYPES,
  buildManifest,
  type OciDescriptor,
  type OciManifest,
  type RequestOptions,
} from "#/oci";
import type { RegistryRepository } from "#/registry";
import type { AppDescriptor } from "#/schemas";
import type { PublishContext, PublishOptions, PublishResult } from "./publish.types";

const EMPTY_CONFIG = Buffer.alloc(0);

/**
 * Upload the (empty) config blob and assemble the bundle manifest
 * around an already uploaded layer.
 */
export async function buildBundleManifest(
  repository: RegistryRepository,
  layer: OciDescriptor,
  annotations: Record<string, string>,
  options: RequestOptions = {}
): Promise<OciManifest> {
  options.signal?.throwIfAborted();
  const config = await repository.putBlob(BUNDLE_MEDIA_TYPES.config, EMPTY_CONFIG, options);
  if (!config.success || !config.descriptor) {
    throw new PublishError(
      `Unable to upload config to ${repository.reference}: ${config.error ?? "no descriptor returned"}`
    );
  }

  return buildManifest(config.descriptor, layer, annotations);
}

/**
 * Publish `descriptor` and the files under `bundleRoot` as `target`.
 * An untagged target is pushed as "latest".
 */
export async function publishBundle(
  ctx: PublishContext,
  descriptor: AppDescriptor,
  target: string,
  options: PublishOptions = {}
): Promise<PublishResult> {
  const { fs, registries, logger, onProgress } = ctx;
  const { signal } = options;
  const bundleRoot = options.bundleRoot ?? ".";
  const kind = options.kind ?? BUNDLE_KINDS.app;

  const archive = await buildArchive(fs, serializeAppDescriptor(descriptor), bundleRoot, {
    descriptorFilename: options.descriptorFilename,
    ignoreFilename: options.ignoreFilename,
    onProgress,
  });

  const parsed = parseImageReference(target);
  if (parsed.digest) {
    throw new ImageReferenceError(
      target,
      `Invalid image reference(${target}): publish target must not contain a digest`
    );
  }
  const ref = withTagOrDefault(parsed);
  const reference = formatImageReference(ref);
  const repository = registries.getRepository(ref);
  logger?.debug("Publishing bundle", { reference, size: archive.length });

  signal?.throwIfAborted();
  const blob = await repository.putBlob(BUNDLE_MEDIA_TYPES.layer, archive, { signal });
  if (!blob.success || !blob.descriptor) {
    throw new PublishError(
      `Unable to upload bundle to ${repository.reference}: ${blob.error ?? "no descriptor returned"}`
    );
  }
  onProgress?.({ type: "blob-uploaded", digest: blob.descriptor.digest, size: blob.descriptor.size });

  const manifest = await buildBundleManifest(
    repository,
    blob.descriptor,
    { [kind]: BUNDLE_FORMAT_VERSION },
    { signal }
  );

  signal?.throwIfAborted();
  const pushed = await repository.putManifest(manifest, ref.tag, { signal });
  if (!pushed.success || !pushed.digest) {
    throw new PublishError(`Unable to push ${reference}: ${pushed.error ?? "no digest returned"}`);
  }
  onProgress?.({ type: "manifest-pushed", digest: pushed.digest, reference });

  return {
    reference,
    tag: ref.tag,
    blobDigest: blob.descriptor.digest,
    manifestDigest: pushed.digest,
    archiveSize: archive.length,
  };
}
