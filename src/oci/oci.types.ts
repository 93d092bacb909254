/**
 * OCI Distribution Spec types
 *
 * Types for interacting with OCI-compliant registries (Docker Hub, GHCR, etc.)
 * Covers what pinning and bundle publishing need: tag resolution, manifest
 * fetches, blob and manifest uploads.
 *
 * @see https://github.com/opencontainers/distribution-spec/blob/main/spec.md
 * @see https://github.com/opencontainers/image-spec/blob/main/manifest.md
 */

/**
 * OCI content descriptor
 * References a blob (layer or config) or a manifest by digest
 */
export interface OciDescriptor {
  /** Media type of the referenced content */
  mediaType: string;
  /** Digest of the content (e.g., sha256:abc123...) */
  digest: string;
  /** Size in bytes */
  size: number;
  /** Optional annotations */
  annotations?: Record<string, string>;
}

/**
 * Manifest-list / image-index entry
 */
export interface OciPlatformDescriptor extends OciDescriptor {
  platform?: {
    architecture: string;
    os: string;
    variant?: string;
  };
}

/**
 * OCI image manifest (v2)
 * Describes an artifact: config + layers
 */
export interface OciManifest {
  /** Schema version, always 2 for OCI */
  schemaVersion: 2;
  /** Media type of the manifest itself */
  mediaType: string;
  /** Config descriptor (artifact metadata) */
  config: OciDescriptor;
  /** Layer descriptors (actual content) */
  layers: OciDescriptor[];
  /** Optional annotations */
  annotations?: Record<string, string>;
}

/**
 * OCI image index / Docker manifest list
 */
export interface OciIndex {
  schemaVersion: 2;
  mediaType: string;
  manifests: OciPlatformDescriptor[];
  annotations?: Record<string, string>;
}

/**
 * A fetched manifest, classified by kind.
 * Use manifestPlatforms() rather than branching on the kind.
 */
export type ManifestVariant =
  | { kind: "single-platform"; manifest: OciManifest }
  | { kind: "platform-list"; index: OciIndex };

export const MANIFEST_MEDIA_TYPES = {
  ociManifest: "application/vnd.oci.image.manifest.v1+json",
  ociIndex: "application/vnd.oci.image.index.v1+json",
  dockerManifest: "application/vnd.docker.distribution.manifest.v2+json",
  dockerManifestList: "application/vnd.docker.distribution.manifest.list.v2+json",
} as const;

/**
 * Media types used by published app bundles
 */
export const BUNDLE_MEDIA_TYPES = {
  /** Manifest media type */
  manifest: MANIFEST_MEDIA_TYPES.ociManifest,
  /** Config blob media type */
  config: "application/vnd.oci.image.config.v1+json",
  /** Layer (tarball) media type */
  layer: "application/tar+gzip",
} as const;

/**
 * Annotation keys marking what a bundle manifest contains
 */
export const BUNDLE_KINDS = {
  app: "compose-app",
  bundle: "compose-bundle",
} as const;

export type BundleKind = (typeof BUNDLE_KINDS)[keyof typeof BUNDLE_KINDS];

export const BUNDLE_FORMAT_VERSION = "v1";

/**
 * OCI registry connection info
 */
export interface OciRegistryConfig {
  /** API host (e.g., registry-1.docker.io, ghcr.io, localhost:5000) */
  host: string;
  /** Username for Basic auth during token exchange */
  username?: string;
  /** Password or token */
  token?: string;
  /** Use plain http instead of https */
  insecure?: boolean;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * Result from resolving a tag to a descriptor
 */
export interface TagDescriptorResult {
  success: boolean;
  descriptor?: OciDescriptor;
  error?: string;
}

/**
 * Result from pulling a manifest
 */
export interface GetManifestResult {
  success: boolean;
  manifest?: ManifestVariant;
  error?: string;
}

/**
 * Result from uploading a blob
 */
export interface PutBlobResult {
  success: boolean;
  descriptor?: OciDescriptor;
  error?: string;
}

/**
 * Result from pushing a manifest
 */
export interface PutManifestResult {
  success: boolean;
  digest?: string;
  error?: string;
}
