/**
 * Error taxonomy.
 *
 * Every error is fatal to the operation that raised it and is never retried
 * here. Callers decide whether to retry the whole workflow.
 */

export type BundleErrorCode =
  | "INPUT"
  | "IMAGE_REFERENCE"
  | "RESOLUTION"
  | "ARCHIVE"
  | "UNSUPPORTED_ENTRY"
  | "PUBLISH"
  | "CONFIG";

export class BundleError extends Error {
  readonly code: BundleErrorCode;

  constructor(code: BundleErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed service record (missing or non-string `image`). */
export class InputError extends BundleError {
  readonly service?: string;

  constructor(message: string, service?: string) {
    super("INPUT", message);
    this.service = service;
  }
}

/** Unparsable image reference, or a reference missing a required tag. */
export class ImageReferenceError extends BundleError {
  readonly reference: string;

  constructor(reference: string, message: string) {
    super("IMAGE_REFERENCE", message);
    this.reference = reference;
  }
}

/** Engine or registry failure while resolving a digest or platform set. */
export class ResolutionError extends BundleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RESOLUTION", message, options);
  }
}

export class ArchiveError extends BundleError {
  constructor(message: string, options?: { cause?: unknown; code?: "ARCHIVE" | "UNSUPPORTED_ENTRY" }) {
    super(options?.code ?? "ARCHIVE", message, options);
  }
}

/** Device, socket, fifo or anything else that is neither file nor symlink. */
export class UnsupportedEntryError extends ArchiveError {
  readonly entry: string;

  constructor(entry: string) {
    super(`Tar: can't archive non-regular entry: ${entry}`, { code: "UNSUPPORTED_ENTRY" });
    this.entry = entry;
  }
}

/** Blob or manifest upload failure. */
export class PublishError extends BundleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PUBLISH", message, options);
  }
}

export class ConfigError extends BundleError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super("CONFIG", message);
    this.details = details;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : "Unknown error";
}
