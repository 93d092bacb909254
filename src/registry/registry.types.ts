/**
 * Registry types and interfaces
 *
 * The pinning and publishing code never talks HTTP: it only sees
 * "a repository" with tag, manifest and blob operations.
 */

import type { ImageReference } from "#/reference";
import type {
  OciManifest,
  RequestOptions,
  TagDescriptorResult,
  GetManifestResult,
  PutBlobResult,
  PutManifestResult,
} from "#/oci";

// Re-export types from schemas to avoid duplication
export type { EngineConfig, RegistryEntry } from "#/schemas";

/**
 * Normalized registry configuration.
 * Created by resolver from raw config, used by factory to create clients.
 */
export interface ResolvedRegistry {
  /** Domain as written in image references (e.g., docker.io) */
  domain: string;
  /** Host serving the Distribution API (e.g., registry-1.docker.io) */
  apiHost: string;
  username?: string;
  token?: string;
  insecure: boolean;
}

/**
 * One repository on one registry.
 */
export interface RegistryRepository {
  /** domain/path, for messages */
  readonly reference: string;

  getTagDescriptor(tag: string, options?: RequestOptions): Promise<TagDescriptorResult>;
  getManifest(digest: string, options?: RequestOptions): Promise<GetManifestResult>;
  putBlob(mediaType: string, data: Buffer, options?: RequestOptions): Promise<PutBlobResult>;
  putManifest(manifest: OciManifest, tag: string, options?: RequestOptions): Promise<PutManifestResult>;
}

/**
 * Resolves the repository an image reference lives in.
 */
export interface RegistryProvider {
  getRepository(ref: ImageReference): RegistryRepository;
}
