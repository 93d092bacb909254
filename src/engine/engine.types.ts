import type { PlatformDescriptor } from "#/core";

export interface EngineClientConfig {
  /** Engine API endpoint (e.g., http://localhost:2375) */
  host: string;
}

/**
 * Result from a distribution inspection
 */
export interface DistributionInspectResult {
  success: boolean;
  digest?: string;
  platforms?: PlatformDescriptor[];
  error?: string;
}
