/**
 * Archive module
 *
 * Packs a bundle directory, minus ignored entries, into a tar+gzip blob.
 */

export { buildArchive, collectArchiveEntries, writeArchive } from "./builder";
export { loadIgnorePatterns, parseIgnoreFile, findExcludingPattern } from "./ignore";
export type { ArchiveEntry, BuildArchiveOptions } from "./archive.types";
