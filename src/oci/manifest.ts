/**
 * Manifest parsing, classification and construction
 */

import { createHash } from "crypto";
import { z } from "zod";
import type { PlatformDescriptor } from "#/core";
import {
  BUNDLE_MEDIA_TYPES,
  MANIFEST_MEDIA_TYPES,
  type ManifestVariant,
  type OciDescriptor,
  type OciIndex,
  type OciManifest,
} from "./oci.types";

export function sha256Digest(data: Buffer | string): string {
  return `sha256:${createHash("sha256").update(data).digest("hex")}`;
}

const DescriptorSchema = z.object({
  mediaType: z.string(),
  digest: z.string(),
  size: z.number(),
  annotations: z.record(z.string(), z.string()).optional(),
});

const ManifestSchema = z.object({
  schemaVersion: z.literal(2),
  mediaType: z.string().optional(),
  config: DescriptorSchema,
  layers: z.array(DescriptorSchema),
  annotations: z.record(z.string(), z.string()).optional(),
});

const IndexSchema = z.object({
  schemaVersion: z.literal(2),
  mediaType: z.string().optional(),
  manifests: z.array(
    DescriptorSchema.extend({
      platform: z
        .object({
          architecture: z.string(),
          os: z.string(),
          variant: z.string().optional(),
        })
        .optional(),
    })
  ),
  annotations: z.record(z.string(), z.string()).optional(),
});

const LIST_TYPES: readonly string[] = [
  MANIFEST_MEDIA_TYPES.ociIndex,
  MANIFEST_MEDIA_TYPES.dockerManifestList,
];
const SINGLE_TYPES: readonly string[] = [
  MANIFEST_MEDIA_TYPES.ociManifest,
  MANIFEST_MEDIA_TYPES.dockerManifest,
];

export type ClassifyResult =
  | { success: true; manifest: ManifestVariant }
  | { success: false; error: string };

/**
 * Classify a raw manifest body.
 *
 * The media type comes from the body when present, falling back to the
 * Content-Type header. OCI manifests may omit both, so shape decides last.
 */
export function classifyManifest(raw: unknown, contentType?: string): ClassifyResult {
  const bodyType =
    typeof raw === "object" && raw !== null && "mediaType" in raw && typeof raw.mediaType === "string"
      ? raw.mediaType
      : undefined;
  const headerType = contentType?.split(";")[0]?.trim();
  const mediaType = bodyType ?? headerType;

  const asList = (): ClassifyResult => {
    const parsed = IndexSchema.safeParse(raw);
    if (!parsed.success) return { success: false, error: "Malformed manifest list" };
    const index: OciIndex = {
      ...parsed.data,
      schemaVersion: 2,
      mediaType: parsed.data.mediaType ?? mediaType ?? MANIFEST_MEDIA_TYPES.ociIndex,
    };
    return { success: true, manifest: { kind: "platform-list", index } };
  };

  const asSingle = (): ClassifyResult => {
    const parsed = ManifestSchema.safeParse(raw);
    if (!parsed.success) return { success: false, error: "Malformed image manifest" };
    const manifest: OciManifest = {
      ...parsed.data,
      schemaVersion: 2,
      mediaType: parsed.data.mediaType ?? mediaType ?? MANIFEST_MEDIA_TYPES.ociManifest,
    };
    return { success: true, manifest: { kind: "single-platform", manifest } };
  };

  if (mediaType && LIST_TYPES.includes(mediaType)) return asList();
  if (mediaType && SINGLE_TYPES.includes(mediaType)) return asSingle();
  if (mediaType) return { success: false, error: `Unexpected manifest media type: ${mediaType}` };

  const list = asList();
  return list.success ? list : asSingle();
}

/**
 * Platforms a manifest covers, in manifest order.
 * Single-platform manifests do not enumerate anything.
 */
export function manifestPlatforms(variant: ManifestVariant): PlatformDescriptor[] {
  switch (variant.kind) {
    case "platform-list":
      return variant.index.manifests.flatMap((entry) =>
        entry.platform
          ? [
              {
                architecture: entry.platform.architecture,
                os: entry.platform.os,
                ...(entry.platform.variant ? { variant: entry.platform.variant } : {}),
              },
            ]
          : []
      );
    case "single-platform":
      return [];
  }
}

/**
 * Build a single-layer manifest referencing an uploaded bundle blob.
 */
export function buildManifest(
  config: OciDescriptor,
  layer: OciDescriptor,
  annotations: Record<string, string>
): OciManifest {
  return {
    schemaVersion: 2,
    mediaType: BUNDLE_MEDIA_TYPES.manifest,
    config,
    layers: [layer],
    annotations,
  };
}
