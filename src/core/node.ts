/**
 * Node-backed implementations of the core interfaces.
 */

import { existsSync, lstatSync, readdirSync, readFileSync, readlinkSync, type Stats } from "fs";
import type { EntryKind, EntryStat, FileSystem, HttpClient, TokenProvider } from "./interfaces";

function entryKind(stats: Stats): EntryKind {
  if (stats.isFile()) return "file";
  if (stats.isDirectory()) return "directory";
  if (stats.isSymbolicLink()) return "symlink";
  return "other";
}

export function createNodeFileSystem(): FileSystem {
  return {
    readFile: (path) => readFileSync(path, "utf-8"),
    readFileBinary: (path) => readFileSync(path),
    exists: (path) => existsSync(path),
    readdir: (path) => readdirSync(path),
    lstat(path): EntryStat {
      const stats = lstatSync(path);
      return {
        kind: entryKind(stats),
        size: stats.size,
        mode: stats.mode & 0o7777,
        mtime: stats.mtime,
      };
    },
    readlink: (path) => readlinkSync(path),
  };
}

export function createFetchHttpClient(): HttpClient {
  return {
    fetch: (url, options) => fetch(url, options),
  };
}

/**
 * Reads registry credentials from the environment.
 * REGISTRY_TOKEN / REGISTRY_USERNAME apply to every registry.
 */
export function createEnvTokenProvider(env: NodeJS.ProcessEnv = process.env): TokenProvider {
  return {
    getRegistryToken: () => env.REGISTRY_TOKEN || undefined,
    getRegistryUsername: () => env.REGISTRY_USERNAME || undefined,
  };
}
