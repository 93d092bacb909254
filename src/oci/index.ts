/**
 * OCI Distribution Spec module
 *
 * Native client for resolving, pulling and pushing against OCI-compliant registries.
 */

export { OciClient } from "./oci-client";
export { classifyManifest, manifestPlatforms, buildManifest, sha256Digest } from "./manifest";
export type { ClassifyResult } from "./manifest";
export type {
  OciDescriptor,
  OciPlatformDescriptor,
  OciManifest,
  OciIndex,
  ManifestVariant,
  OciRegistryConfig,
  RequestOptions,
  TagDescriptorResult,
  GetManifestResult,
  PutBlobResult,
  PutManifestResult,
  BundleKind,
} from "./oci.types";
export {
  MANIFEST_MEDIA_TYPES,
  BUNDLE_MEDIA_TYPES,
  BUNDLE_KINDS,
  BUNDLE_FORMAT_VERSION,
} from "./oci.types";
