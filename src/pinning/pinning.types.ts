import type { Logger, PlatformDescriptor, ProgressListener } from "#/core";
import type { TaggedImageReference } from "#/reference";
import type { RequestOptions } from "#/oci";

/**
 * Digest and platform set an image tag currently points at
 */
export interface ResolvedDigest {
  digest: string;
  /** Manifest-list order; empty for single-platform images */
  platforms: PlatformDescriptor[];
}

/**
 * Strategy for turning a tagged reference into a digest.
 * Implementations throw ResolutionError on any transport or not-found failure.
 */
export interface DigestResolver {
  resolve(ref: TaggedImageReference, options?: RequestOptions): Promise<ResolvedDigest>;
}

export interface PinOptions {
  onProgress?: ProgressListener;
  logger?: Logger;
  signal?: AbortSignal;
}
