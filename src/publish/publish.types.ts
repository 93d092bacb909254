import type { FileSystem, Logger, ProgressListener } from "#/core";
import type { BundleKind } from "#/oci";
import type { RegistryProvider } from "#/registry";

/**
 * Collaborators a publish needs
 */
export interface PublishContext {
  fs: FileSystem;
  registries: RegistryProvider;
  logger?: Logger;
  onProgress?: ProgressListener;
}

export interface PublishOptions {
  /** Directory bundled alongside the descriptor (default ".") */
  bundleRoot?: string;
  /** Annotation key marking the manifest (default "compose-app") */
  kind?: BundleKind;
  descriptorFilename?: string;
  ignoreFilename?: string;
  signal?: AbortSignal;
}

export interface PublishResult {
  /** domain/path:tag the manifest was pushed under */
  reference: string;
  tag: string;
  blobDigest: string;
  manifestDigest: string;
  archiveSize: number;
}
