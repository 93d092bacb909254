/**
 * Ignore-file handling
 *
 * One glob pattern per line, matched against archive-relative paths.
 * A pattern that matches a directory excludes everything below it.
 * There is no negation: a leading "!" is part of the pattern.
 */

import { join, posix } from "path";
import { minimatch } from "minimatch";
import type { FileSystem } from "#/core";

/**
 * Read patterns from the ignore-file at the root of `rootDir`.
 * Returns an empty list when there is no ignore-file. When there is one,
 * its own name is appended so it never ends up in the archive.
 */
export function loadIgnorePatterns(fs: FileSystem, rootDir: string, ignoreFilename: string): string[] {
  const ignorePath = join(rootDir, ignoreFilename);
  if (!fs.exists(ignorePath)) {
    return [];
  }

  return [...parseIgnoreFile(fs.readFile(ignorePath)), ignoreFilename];
}

/**
 * Parse ignore-file content. Blank lines and "#" comments are skipped;
 * patterns are cleaned so "./build/" and "/build" both read "build".
 */
export function parseIgnoreFile(content: string): string[] {
  const patterns: string[] = [];

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    let pattern = posix.normalize(trimmed.replace(/\\/g, "/"));
    pattern = pattern.replace(/^(\.\/|\/)+/, "").replace(/\/+$/, "");
    if (pattern && pattern !== ".") {
      patterns.push(pattern);
    }
  }

  return patterns;
}

/**
 * Return the first pattern excluding `name`, testing the path itself and
 * then each of its parent directories.
 *
 * @example
 * findExcludingPattern("build/out/app.js", ["build"]) → "build"
 * findExcludingPattern("sub/b.txt", ["sub/*"]) → "sub/*"
 */
export function findExcludingPattern(name: string, patterns: readonly string[]): string | undefined {
  if (patterns.length === 0) return undefined;

  const parts = name.split("/");
  for (let depth = parts.length; depth > 0; depth--) {
    const candidate = parts.slice(0, depth).join("/");
    const pattern = patterns.find((p) => minimatch(candidate, p, { dot: true, nonegate: true, nocomment: true }));
    if (pattern) return pattern;
  }

  return undefined;
}
