/**
 * Bundle archive builder
 *
 * Walks a directory and produces a gzip-compressed tar archive in memory.
 * The canonical descriptor entry always carries the serialized descriptor,
 * whatever is on disk under that name.
 *
 * Entry set, names and contents are stable for a given tree and descriptor.
 * The archive bytes are not: timestamps come from the filesystem.
 */

import { join, relative, sep } from "path";
import { createGzip } from "zlib";
import { buffer } from "stream/consumers";
import { pack, type Pack } from "tar-stream";
import {
  ArchiveError,
  BundleError,
  UnsupportedEntryError,
  errorMessage,
  type FileSystem,
} from "#/core";
import { DESCRIPTOR_FILENAME, IGNORE_FILENAME } from "#/constants";
import { loadIgnorePatterns, findExcludingPattern } from "./ignore";
import type { ArchiveEntry, BuildArchiveOptions } from "./archive.types";

const DEFAULT_FILE_MODE = 0o644;

function attempt<T>(what: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof BundleError) throw err;
    throw new ArchiveError(`Tar: ${what}: ${errorMessage(err)}`, { cause: err });
  }
}

function toArchiveName(rootDir: string, fullPath: string): string {
  return relative(rootDir, fullPath).split(sep).join("/").replace(/^\/+/, "");
}

/**
 * Plan the archive: walk `rootDir` in sorted order and return the entries
 * that would be written, without writing anything.
 */
export function collectArchiveEntries(
  fs: FileSystem,
  descriptor: Buffer,
  rootDir: string,
  options: BuildArchiveOptions = {}
): ArchiveEntry[] {
  const descriptorFilename = options.descriptorFilename ?? DESCRIPTOR_FILENAME;
  const ignoreFilename = options.ignoreFilename ?? IGNORE_FILENAME;

  const patterns = attempt(`can't read ${ignoreFilename}`, () =>
    loadIgnorePatterns(fs, rootDir, ignoreFilename)
  );
  const warned = new Set<string>();
  const entries: ArchiveEntry[] = [];
  let descriptorWritten = false;

  const descriptorEntry = (mode: number, mtime: Date): ArchiveEntry => ({
    kind: "file",
    name: descriptorFilename,
    size: descriptor.length,
    mode,
    mtime,
    content: descriptor,
  });

  const walk = (dir: string): void => {
    const names = attempt(`can't read directory ${dir}`, () => fs.readdir(dir)).sort();

    for (const entryName of names) {
      const fullPath = join(dir, entryName);
      const name = toArchiveName(rootDir, fullPath);
      const stat = attempt(`can't stat file ${fullPath}`, () => fs.lstat(fullPath));

      if (stat.kind === "directory") {
        walk(fullPath);
        continue;
      }

      if (name === descriptorFilename) {
        entries.push(descriptorEntry(stat.mode, stat.mtime));
        descriptorWritten = true;
        continue;
      }

      const pattern = findExcludingPattern(name, patterns);
      if (pattern) {
        if (!warned.has(pattern)) {
          warned.add(pattern);
          options.onProgress?.({ type: "pattern-ignored", pattern });
        }
        continue;
      }

      switch (stat.kind) {
        case "file":
          entries.push({
            kind: "file",
            name,
            size: stat.size,
            mode: stat.mode,
            mtime: stat.mtime,
            content: attempt(`can't read file ${fullPath}`, () => fs.readFileBinary(fullPath)),
          });
          break;
        case "symlink":
          entries.push({
            kind: "symlink",
            name,
            size: 0,
            mode: stat.mode,
            mtime: stat.mtime,
            linkname: attempt(`can't find symlink ${fullPath}`, () => fs.readlink(fullPath)),
          });
          break;
        case "other":
          throw new UnsupportedEntryError(name);
      }
    }
  };

  walk(rootDir);

  if (!descriptorWritten) {
    entries.push(descriptorEntry(DEFAULT_FILE_MODE, new Date()));
  }

  return entries;
}

function addEntry(archive: Pack, entry: ArchiveEntry): Promise<void> {
  return new Promise((resolve, reject) => {
    const callback = (err?: Error | null): void => (err ? reject(err) : resolve());

    if (entry.kind === "symlink") {
      archive.entry(
        { name: entry.name, type: "symlink", linkname: entry.linkname, mode: entry.mode, mtime: entry.mtime },
        callback
      );
    } else {
      archive.entry(
        // Size comes from the content so a file that changed since lstat stays consistent
        { name: entry.name, type: "file", size: entry.content.length, mode: entry.mode, mtime: entry.mtime },
        entry.content,
        callback
      );
    }
  });
}

/**
 * Write planned entries as a gzip-compressed tar stream.
 */
export async function writeArchive(entries: readonly ArchiveEntry[]): Promise<Buffer> {
  const archive = pack();
  const output = archive.pipe(createGzip());

  const fill = async (): Promise<void> => {
    try {
      for (const entry of entries) {
        await addEntry(archive, entry);
      }
      archive.finalize();
    } catch (err) {
      archive.destroy(err instanceof Error ? err : undefined);
      throw new ArchiveError(`Tar: can't write archive: ${errorMessage(err)}`, { cause: err });
    }
  };

  const [data] = await Promise.all([buffer(output), fill()]);
  return data;
}

/**
 * Build the bundle archive for `rootDir`, substituting `descriptor` for the
 * canonical descriptor entry.
 */
export async function buildArchive(
  fs: FileSystem,
  descriptor: Buffer,
  rootDir: string,
  options: BuildArchiveOptions = {}
): Promise<Buffer> {
  const entries = collectArchiveEntries(fs, descriptor, rootDir, options);
  const archive = await writeArchive(entries);

  options.onProgress?.({ type: "archive-built", entries: entries.length, size: archive.length });
  return archive;
}
