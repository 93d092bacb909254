/**
 * Test utilities - read back a gzip-compressed tar archive
 */

import { gunzipSync } from "zlib";
import { extract } from "tar-stream";

export interface ExtractedEntry {
  name: string;
  type: string;
  size: number;
  linkname?: string;
  content: Buffer;
}

export async function readArchive(archive: Buffer): Promise<ExtractedEntry[]> {
  const entries: ExtractedEntry[] = [];
  const extractor = extract();

  const done = new Promise<void>((resolve, reject) => {
    extractor.on("entry", (header, stream, next) => {
      const chunks: Buffer[] = [];
      stream.on("data", (chunk: unknown) => {
        if (Buffer.isBuffer(chunk)) chunks.push(chunk);
      });
      stream.on("end", () => {
        entries.push({
          name: header.name,
          type: header.type ?? "file",
          size: header.size ?? 0,
          linkname: header.linkname ?? undefined,
          content: Buffer.concat(chunks),
        });
        next();
      });
      stream.resume();
    });
    extractor.on("finish", () => resolve());
    extractor.on("error", reject);
  });

  extractor.end(gunzipSync(archive));
  await done;
  return entries;
}
