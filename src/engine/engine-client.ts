/**
 * Container engine client
 *
 * Asks a local engine to inspect an image on its registry. The engine holds
 * its own credentials, so this path needs no token exchange.
 */

import { z } from "zod";
import { errorMessage, type HttpClient, type PlatformDescriptor } from "#/core";
import { USER_AGENT } from "#/constants";
import type { RequestOptions } from "#/oci";
import type { DistributionInspectResult, EngineClientConfig } from "./engine.types";

const DistributionInspectSchema = z.object({
  Descriptor: z.object({
    mediaType: z.string().optional(),
    digest: z.string(),
    size: z.number().optional(),
  }),
  Platforms: z
    .array(
      z.object({
        architecture: z.string(),
        os: z.string().optional(),
        variant: z.string().optional(),
      })
    )
    .default([]),
});

export class EngineClient {
  private host: string;
  private http: HttpClient;

  constructor(config: EngineClientConfig, http: HttpClient) {
    this.host = config.host.replace(/\/+$/, "");
    this.http = http;
  }

  /**
   * Resolve the digest and platforms of an image reference.
   *
   * @example
   * await engine.inspectDistribution("docker.io/library/nginx:stable")
   * // → { success: true, digest: "sha256:…", platforms: [{ architecture: "amd64", os: "linux" }] }
   */
  async inspectDistribution(
    reference: string,
    options: RequestOptions = {}
  ): Promise<DistributionInspectResult> {
    const url = `${this.host}/distribution/${encodeURIComponent(reference)}/json`;

    try {
      const response = await this.http.fetch(url, {
        headers: { "User-Agent": USER_AGENT, Accept: "application/json" },
        signal: options.signal,
      });

      if (!response.ok) {
        const detail = await readEngineMessage(response);
        return {
          success: false,
          error: `Engine failed to inspect ${reference}: ${response.status} ${detail ?? response.statusText}`,
        };
      }

      const parsed = DistributionInspectSchema.safeParse(await response.json());
      if (!parsed.success) {
        return { success: false, error: `Unexpected engine response for ${reference}` };
      }

      const platforms: PlatformDescriptor[] = parsed.data.Platforms.map((p) => ({
        architecture: p.architecture,
        ...(p.os ? { os: p.os } : {}),
        ...(p.variant ? { variant: p.variant } : {}),
      }));

      return { success: true, digest: parsed.data.Descriptor.digest, platforms };
    } catch (err) {
      return { success: false, error: `Failed to reach engine: ${errorMessage(err)}` };
    }
  }
}

const EngineMessageSchema = z.object({ message: z.string() });

// Engine errors come back as {"message": "..."}
async function readEngineMessage(response: Response): Promise<string | undefined> {
  try {
    const parsed = EngineMessageSchema.safeParse(await response.json());
    return parsed.success ? parsed.data.message : undefined;
  } catch {
    return undefined;
  }
}
