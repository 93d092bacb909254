/**
 * Core interfaces for dependency injection.
 * These abstract away I/O operations for testability and portability.
 */

export type EntryKind = "file" | "directory" | "symlink" | "other";

export interface EntryStat {
  kind: EntryKind;
  size: number;
  mode: number;
  mtime: Date;
}

/**
 * Synchronous filesystem view. `lstat` never follows symlinks.
 */
export interface FileSystem {
  readFile(path: string): string;
  readFileBinary(path: string): Buffer;
  exists(path: string): boolean;
  readdir(path: string): string[];
  lstat(path: string): EntryStat;
  readlink(path: string): string;
}

export interface HttpClient {
  fetch(url: string, options?: RequestInit): Promise<Response>;
}

export interface TokenProvider {
  getRegistryToken(domain: string): string | undefined;
  getRegistryUsername(domain: string): string | undefined;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Structured progress emitted by pinning, archiving and publishing.
 * Formatting is left to the presentation layer (see formatters).
 */
export type ProgressEvent =
  | { type: "pin-started"; service: string; image: string }
  | {
      type: "service-pinned";
      service: string;
      image: string;
      platforms: PlatformDescriptor[];
      pinned: string;
    }
  | { type: "pattern-ignored"; pattern: string }
  | { type: "archive-built"; entries: number; size: number }
  | { type: "blob-uploaded"; digest: string; size: number }
  | { type: "manifest-pushed"; digest: string; reference: string };

export type ProgressListener = (event: ProgressEvent) => void;

export interface PlatformDescriptor {
  architecture: string;
  os?: string;
  variant?: string;
}

export interface EngineContext {
  fs: FileSystem;
  http: HttpClient;
  tokens: TokenProvider;
  logger: Logger;
  onProgress?: ProgressListener;
}
