import type { ProgressListener } from "#/core";

/**
 * One planned archive entry. Directories never produce entries.
 * `name` is root-relative, "/"-separated, with no leading separator.
 */
export type ArchiveEntry =
  | { kind: "file"; name: string; size: number; mode: number; mtime: Date; content: Buffer }
  | { kind: "symlink"; name: string; size: 0; mode: number; mtime: Date; linkname: string };

export interface BuildArchiveOptions {
  /** Name of the entry replaced by the serialized descriptor */
  descriptorFilename?: string;
  /** Ignore-file read from the root of the bundled directory */
  ignoreFilename?: string;
  onProgress?: ProgressListener;
}
