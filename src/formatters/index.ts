import type { PlatformDescriptor, ProgressEvent } from "#/core";

/**
 * Format bytes to human readable string.
 *
 * @example formatBytes(500) → "500 B"
 * @example formatBytes(1536) → "1.5 KB"
 * @example formatBytes(1572864) → "1.5 MB"
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Architecture label. Only arm carries its variant, with no separator.
 *
 * @example formatPlatform({ architecture: "arm", variant: "v7" }) → "armv7"
 * @example formatPlatform({ architecture: "arm64", variant: "v8" }) → "arm64"
 */
export function formatPlatform(platform: PlatformDescriptor): string {
  if (platform.architecture === "arm" && platform.variant) {
    return `${platform.architecture}${platform.variant}`;
  }
  return platform.architecture;
}

/**
 * @example formatPlatforms([{ architecture: "amd64" }, { architecture: "arm", variant: "v7" }]) → "amd64, armv7"
 */
export function formatPlatforms(platforms: readonly PlatformDescriptor[]): string {
  return platforms.map(formatPlatform).join(", ");
}

/**
 * One or more output lines for a progress event.
 */
export function formatProgressEvent(event: ProgressEvent): string[] {
  switch (event.type) {
    case "pin-started":
      return [`Pinning ${event.service}(${event.image})`];
    case "service-pinned": {
      const lines = event.platforms.length > 0 ? [`  | ${formatPlatforms(event.platforms)}`] : [];
      return [...lines, `  |-> ${event.pinned}`];
    }
    case "pattern-ignored":
      return [`  |-> ignoring: ${event.pattern}`];
    case "archive-built":
      return [`  |-> archive: ${event.entries} entries, ${formatBytes(event.size)}`];
    case "blob-uploaded":
      return [`  |-> app: ${event.digest}`];
    case "manifest-pushed":
      return [`  |-> manifest: ${event.digest}`];
  }
}
