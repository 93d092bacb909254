/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import type {
  EntryStat,
  FileSystem,
  HttpClient,
  Logger,
  ProgressEvent,
  TokenProvider,
} from "#/core";

export const MOCK_MTIME = new Date("2024-01-01T00:00:00.000Z");

type MockEntry =
  | { kind: "file"; content: string | Buffer }
  | { kind: "directory" }
  | { kind: "symlink"; target: string }
  | { kind: "other" };

function trimSlash(path: string): string {
  return path.endsWith("/") && path.length > 1 ? path.slice(0, -1) : path;
}

function enoent(op: string, path: string): Error {
  return Object.assign(new Error(`ENOENT: no such file or directory, ${op} '${path}'`), {
    code: "ENOENT",
  });
}

/**
 * Create a mock FileSystem with in-memory storage.
 * Parent directories exist implicitly as soon as something lives below them.
 */
export function createMockFileSystem(initialFiles: Record<string, string | Buffer> = {}): FileSystem & {
  files: Map<string, MockEntry>;
  addDirectory(path: string): void;
  addSymlink(path: string, target: string): void;
  addSpecial(path: string): void;
} {
  const files = new Map<string, MockEntry>();

  for (const [path, content] of Object.entries(initialFiles)) {
    files.set(path, { kind: "file", content });
  }

  const hasChildren = (path: string): boolean => {
    const prefix = `${trimSlash(path)}/`;
    for (const key of files.keys()) {
      if (key.startsWith(prefix)) return true;
    }
    return false;
  };

  const getFile = (op: string, path: string): string | Buffer => {
    const entry = files.get(path);
    if (!entry || entry.kind !== "file") {
      throw enoent(op, path);
    }
    return entry.content;
  };

  return {
    files,

    addDirectory(path: string): void {
      files.set(trimSlash(path), { kind: "directory" });
    },

    addSymlink(path: string, target: string): void {
      files.set(path, { kind: "symlink", target });
    },

    addSpecial(path: string): void {
      files.set(path, { kind: "other" });
    },

    readFile(path: string): string {
      const content = getFile("open", path);
      return typeof content === "string" ? content : content.toString("utf-8");
    },

    readFileBinary(path: string): Buffer {
      const content = getFile("open", path);
      return typeof content === "string" ? Buffer.from(content) : content;
    },

    exists(path: string): boolean {
      return files.has(trimSlash(path)) || hasChildren(path);
    },

    readdir(path: string): string[] {
      const normalizedPath = trimSlash(path);
      const entry = files.get(normalizedPath);
      if (!entry && !hasChildren(normalizedPath)) {
        throw enoent("scandir", path);
      }

      const results: Set<string> = new Set();
      for (const filePath of files.keys()) {
        if (filePath.startsWith(normalizedPath + "/")) {
          const firstPart = filePath.slice(normalizedPath.length + 1).split("/")[0];
          if (firstPart) {
            results.add(firstPart);
          }
        }
      }

      return Array.from(results);
    },

    lstat(path: string): EntryStat {
      const normalizedPath = trimSlash(path);
      const entry = files.get(normalizedPath);

      if (!entry) {
        if (hasChildren(normalizedPath)) {
          return { kind: "directory", size: 0, mode: 0o755, mtime: MOCK_MTIME };
        }
        throw enoent("lstat", path);
      }

      switch (entry.kind) {
        case "file":
          return {
            kind: "file",
            size: Buffer.byteLength(entry.content),
            mode: 0o644,
            mtime: MOCK_MTIME,
          };
        case "directory":
          return { kind: "directory", size: 0, mode: 0o755, mtime: MOCK_MTIME };
        case "symlink":
          return { kind: "symlink", size: entry.target.length, mode: 0o777, mtime: MOCK_MTIME };
        case "other":
          return { kind: "other", size: 0, mode: 0o644, mtime: MOCK_MTIME };
      }
    },

    readlink(path: string): string {
      const entry = files.get(path);
      if (!entry || entry.kind !== "symlink") {
        throw Object.assign(new Error(`EINVAL: invalid argument, readlink '${path}'`), {
          code: "EINVAL",
        });
      }
      return entry.target;
    },
  };
}

/**
 * Recorded HTTP request
 */
export interface HttpCall {
  method: string;
  url: string;
  headers: Headers;
  body?: Buffer;
}

type ResponseSource = Response | (() => Response);

/**
 * Create a mock HttpClient with predefined responses.
 * Keys are either "METHOD url" or a bare url matching any method;
 * the method-specific key wins.
 */
export function createMockHttpClient(
  responses: Map<string, ResponseSource> = new Map()
): HttpClient & { responses: Map<string, ResponseSource>; calls: HttpCall[] } {
  const calls: HttpCall[] = [];

  return {
    responses,
    calls,

    async fetch(url: string, options: RequestInit = {}): Promise<Response> {
      const method = (options.method ?? "GET").toUpperCase();
      const body =
        options.body instanceof Uint8Array ? Buffer.from(options.body) : undefined;
      calls.push({ method, url, headers: new Headers(options.headers), body });

      const responseOrFactory = responses.get(`${method} ${url}`) ?? responses.get(url);

      if (!responseOrFactory) {
        return new Response(null, {
          status: 404,
          statusText: "Not Found",
        });
      }

      return typeof responseOrFactory === "function"
        ? responseOrFactory()
        : responseOrFactory;
    },
  };
}

/**
 * Create a mock TokenProvider
 */
export function createMockTokenProvider(
  tokens: Record<string, { username?: string; token?: string }> = {}
): TokenProvider {
  return {
    getRegistryToken: (domain) => tokens[domain]?.token,
    getRegistryUsername: (domain) => tokens[domain]?.username,
  };
}

/**
 * Logger that records every line instead of printing it
 */
export function createMockLogger(): Logger & {
  lines: { level: string; message: string; meta?: Record<string, unknown> }[];
} {
  const lines: { level: string; message: string; meta?: Record<string, unknown> }[] = [];
  const record =
    (level: string) =>
    (message: string, meta?: Record<string, unknown>): void => {
      lines.push({ level, message, meta });
    };

  return {
    lines,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}

/**
 * Progress listener that collects events
 */
export function createEventRecorder(): { events: ProgressEvent[]; listener: (event: ProgressEvent) => void } {
  const events: ProgressEvent[] = [];
  return { events, listener: (event) => events.push(event) };
}

/**
 * Helper to create a successful JSON response
 */
export function jsonResponse(
  data: unknown,
  status = 200,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

/**
 * Helper to create an empty response carrying only status and headers
 */
export function emptyResponse(status: number, headers: Record<string, string> = {}): Response {
  return new Response(null, { status, headers });
}

/**
 * Helper to create an error response
 */
export function errorResponse(status: number, statusText: string): Response {
  return new Response(null, { status, statusText });
}
