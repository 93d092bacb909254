/**
 * OCI Distribution Spec client
 *
 * Native TypeScript implementation of the registry operations needed to pin
 * images and publish bundles: tag resolution, manifest fetches, blob uploads
 * and manifest pushes.
 *
 * @see https://github.com/opencontainers/distribution-spec/blob/main/spec.md
 */

import { z } from "zod";
import { errorMessage, type HttpClient } from "#/core";
import { USER_AGENT } from "#/constants";
import type {
  OciRegistryConfig,
  OciManifest,
  OciDescriptor,
  RequestOptions,
  TagDescriptorResult,
  GetManifestResult,
  PutBlobResult,
  PutManifestResult,
} from "./oci.types";
import { MANIFEST_MEDIA_TYPES } from "./oci.types";
import { classifyManifest, sha256Digest } from "./manifest";

const MANIFEST_ACCEPT = [
  MANIFEST_MEDIA_TYPES.ociIndex,
  MANIFEST_MEDIA_TYPES.dockerManifestList,
  MANIFEST_MEDIA_TYPES.ociManifest,
  MANIFEST_MEDIA_TYPES.dockerManifest,
].join(", ");

interface BearerChallenge {
  scheme: "bearer";
  realm: string;
  service?: string;
  scope?: string;
}

type AuthChallenge = { scheme: "basic" } | BearerChallenge;

const TokenResponseSchema = z
  .object({
    token: z.string().optional(),
    access_token: z.string().optional(),
  })
  .transform((data) => data.token ?? data.access_token);

export class OciClient {
  private host: string;
  private username?: string;
  private token?: string;
  private scheme: "http" | "https";
  private http: HttpClient;
  private tokenCache: Map<string, string> = new Map();
  /** Last accepted Authorization header per repository name */
  private authorizations: Map<string, string> = new Map();

  constructor(config: OciRegistryConfig, http: HttpClient) {
    this.host = config.host;
    this.username = config.username;
    this.token = config.token;
    this.scheme = config.insecure ? "http" : "https";
    this.http = http;
  }

  /**
   * Get request headers for OCI registry API
   */
  private getHeaders(extra: Record<string, string> = {}): Record<string, string> {
    return {
      "User-Agent": USER_AGENT,
      ...extra,
    };
  }

  private baseUrl(): string {
    return `${this.scheme}://${this.host}`;
  }

  /**
   * Build OCI registry URL
   * @param name - Repository path (e.g., "library/nginx")
   * @param path - API path after the name
   */
  private buildUrl(name: string, path: string): string {
    return `${this.baseUrl()}/v2/${name}${path}`;
  }

  /**
   * Parse WWW-Authenticate header from a 401 response
   *
   * Expected formats:
   *   Bearer realm="<url>",service="<service>",scope="<scope>"
   *   Basic realm="<realm>"
   */
  private parseWwwAuthenticate(header: string): AuthChallenge | undefined {
    const [scheme = "", ...rest] = header.trim().split(" ");
    const params = rest.join(" ");

    switch (scheme.toLowerCase()) {
      case "basic":
        return { scheme: "basic" };
      case "bearer": {
        const realm = params.match(/realm="([^"]+)"/)?.[1];
        if (!realm) return undefined;
        return {
          scheme: "bearer",
          realm,
          service: params.match(/service="([^"]+)"/)?.[1],
          scope: params.match(/scope="([^"]+)"/)?.[1],
        };
      }
      default:
        return undefined;
    }
  }

  private basicCredentials(): string | undefined {
    if (!this.token) return undefined;
    return Buffer.from(`${this.username ?? "USERNAME"}:${this.token}`).toString("base64");
  }

  /**
   * Exchange credentials (or nothing, for anonymous pulls) for a registry Bearer token
   *
   * 1. Initial request returns 401 with WWW-Authenticate header
   * 2. Call the token endpoint, with Basic auth when credentials are configured
   * 3. Use the returned token for subsequent requests
   */
  private async exchangeToken(
    challenge: BearerChallenge,
    signal?: AbortSignal
  ): Promise<string | undefined> {
    const cacheKey = `${challenge.service ?? ""}:${challenge.scope ?? ""}`;
    const cached = this.tokenCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const tokenUrl = new URL(challenge.realm);
    if (challenge.service) tokenUrl.searchParams.set("service", challenge.service);
    if (challenge.scope) tokenUrl.searchParams.set("scope", challenge.scope);

    const headers = this.getHeaders();
    const basicAuth = this.basicCredentials();
    if (basicAuth) {
      headers["Authorization"] = `Basic ${basicAuth}`;
    }

    const response = await this.http.fetch(tokenUrl.toString(), { headers, signal });
    if (!response.ok) {
      return undefined;
    }

    const parsed = TokenResponseSchema.safeParse(await response.json());
    const exchangedToken = parsed.success ? parsed.data : undefined;

    if (exchangedToken) {
      this.tokenCache.set(cacheKey, exchangedToken);
    }

    return exchangedToken;
  }

  /**
   * Authorization header answering a challenge, if we can answer it
   */
  private async answerChallenge(
    wwwAuthenticate: string,
    signal?: AbortSignal
  ): Promise<string | undefined> {
    const challenge = this.parseWwwAuthenticate(wwwAuthenticate);
    if (!challenge) {
      return undefined;
    }

    if (challenge.scheme === "basic") {
      const basicAuth = this.basicCredentials();
      return basicAuth ? `Basic ${basicAuth}` : undefined;
    }

    const exchangedToken = await this.exchangeToken(challenge, signal);
    return exchangedToken ? `Bearer ${exchangedToken}` : undefined;
  }

  /**
   * Fetch with automatic challenge handling on 401 responses
   *
   * Registries don't accept long-lived credentials as Bearer tokens.
   * This method handles the challenge-response flow transparently:
   * 1. Make the request, with the last accepted authorization for `name`
   * 2. If 401 with WWW-Authenticate, answer the Basic or Bearer challenge
   * 3. Retry the request, remembering the authorization when it is accepted
   */
  private async authenticatedFetch(
    name: string,
    url: string,
    options: RequestInit = {}
  ): Promise<Response> {
    const headers = new Headers(options.headers);
    const known = this.authorizations.get(name);
    if (known) {
      headers.set("Authorization", known);
    }

    const response = await this.http.fetch(url, { ...options, headers });

    if (response.status !== 401) {
      return response;
    }

    const wwwAuthenticate = response.headers.get("www-authenticate");
    if (!wwwAuthenticate) {
      return response;
    }

    const authorization = await this.answerChallenge(wwwAuthenticate, options.signal ?? undefined);
    if (!authorization || authorization === known) {
      return response;
    }

    headers.set("Authorization", authorization);
    const retried = await this.http.fetch(url, { ...options, headers });
    if (retried.status !== 401) {
      this.authorizations.set(name, authorization);
    }
    return retried;
  }

  /**
   * Resolve a tag to the descriptor of the manifest it points at
   *
   * HEAD /v2/<name>/manifests/<tag>, falling back to GET when the registry
   * does not report Docker-Content-Digest.
   */
  async getTagDescriptor(
    name: string,
    tag: string,
    options: RequestOptions = {}
  ): Promise<TagDescriptorResult> {
    try {
      const url = this.buildUrl(name, `/manifests/${tag}`);
      const headers = this.getHeaders({ Accept: MANIFEST_ACCEPT });

      const head = await this.authenticatedFetch(name, url, { method: "HEAD", headers, signal: options.signal });
      if (head.status === 404) {
        return { success: false, error: `Manifest unknown: ${name}:${tag}` };
      }

      const headDigest = head.headers.get("docker-content-digest");
      if (head.ok && headDigest) {
        return {
          success: true,
          descriptor: {
            mediaType: head.headers.get("content-type") ?? MANIFEST_MEDIA_TYPES.ociManifest,
            digest: headDigest,
            size: Number(head.headers.get("content-length") ?? 0),
          },
        };
      }

      const response = await this.authenticatedFetch(name, url, { headers, signal: options.signal });
      if (!response.ok) {
        if (response.status === 404) {
          return { success: false, error: `Manifest unknown: ${name}:${tag}` };
        }
        return {
          success: false,
          error: `Failed to resolve tag: ${response.status} ${response.statusText}`,
        };
      }

      const body = Buffer.from(await response.arrayBuffer());
      return {
        success: true,
        descriptor: {
          mediaType: response.headers.get("content-type") ?? MANIFEST_MEDIA_TYPES.ociManifest,
          digest: response.headers.get("docker-content-digest") ?? sha256Digest(body),
          size: body.length,
        },
      };
    } catch (err) {
      return { success: false, error: `Failed to resolve tag: ${errorMessage(err)}` };
    }
  }

  /**
   * Pull a manifest by digest (or tag) and classify it
   *
   * GET /v2/<name>/manifests/<reference>
   */
  async getManifest(
    name: string,
    reference: string,
    options: RequestOptions = {}
  ): Promise<GetManifestResult> {
    try {
      const url = this.buildUrl(name, `/manifests/${reference}`);

      const response = await this.authenticatedFetch(name, url, {
        headers: this.getHeaders({ Accept: MANIFEST_ACCEPT }),
        signal: options.signal,
      });

      if (!response.ok) {
        if (response.status === 404) {
          return { success: false, error: `Manifest not found: ${name}@${reference}` };
        }
        return {
          success: false,
          error: `Failed to pull manifest: ${response.status} ${response.statusText}`,
        };
      }

      const raw: unknown = await response.json();
      const classified = classifyManifest(raw, response.headers.get("content-type") ?? undefined);
      if (!classified.success) {
        return { success: false, error: classified.error };
      }

      return { success: true, manifest: classified.manifest };
    } catch (err) {
      return { success: false, error: `Failed to pull manifest: ${errorMessage(err)}` };
    }
  }

  /**
   * Check whether a blob is already present
   *
   * HEAD /v2/<name>/blobs/<digest>
   */
  async blobExists(name: string, digest: string, options: RequestOptions = {}): Promise<boolean> {
    const response = await this.authenticatedFetch(name, this.buildUrl(name, `/blobs/${digest}`), {
      method: "HEAD",
      headers: this.getHeaders(),
      signal: options.signal,
    });
    return response.ok;
  }

  /**
   * Upload a blob in a single request (monolithic upload)
   *
   * POST /v2/<name>/blobs/uploads/ then PUT <location>?digest=<digest>
   */
  async putBlob(
    name: string,
    mediaType: string,
    data: Buffer,
    options: RequestOptions = {}
  ): Promise<PutBlobResult> {
    const digest = sha256Digest(data);
    const descriptor: OciDescriptor = { mediaType, digest, size: data.length };

    try {
      if (await this.blobExists(name, digest, options)) {
        return { success: true, descriptor };
      }

      const start = await this.authenticatedFetch(name, this.buildUrl(name, "/blobs/uploads/"), {
        method: "POST",
        headers: this.getHeaders({ "Content-Length": "0" }),
        signal: options.signal,
      });
      const location = start.headers.get("location");
      if (!start.ok || !location) {
        return {
          success: false,
          error: `Failed to start blob upload: ${start.status} ${start.statusText}`,
        };
      }

      const uploadUrl = new URL(location, this.baseUrl());
      uploadUrl.searchParams.set("digest", digest);

      const response = await this.authenticatedFetch(name, uploadUrl.toString(), {
        method: "PUT",
        headers: this.getHeaders({
          "Content-Type": "application/octet-stream",
          "Content-Length": String(data.length),
        }),
        body: data,
        signal: options.signal,
      });

      if (!response.ok) {
        return {
          success: false,
          error: `Failed to upload blob: ${response.status} ${response.statusText}`,
        };
      }

      return { success: true, descriptor };
    } catch (err) {
      return { success: false, error: `Failed to upload blob: ${errorMessage(err)}` };
    }
  }

  /**
   * Push a manifest under a tag
   *
   * PUT /v2/<name>/manifests/<tag>
   */
  async putManifest(
    name: string,
    manifest: OciManifest,
    tag: string,
    options: RequestOptions = {}
  ): Promise<PutManifestResult> {
    const body = Buffer.from(JSON.stringify(manifest));

    try {
      const response = await this.authenticatedFetch(name, this.buildUrl(name, `/manifests/${tag}`), {
        method: "PUT",
        headers: this.getHeaders({ "Content-Type": manifest.mediaType }),
        body,
        signal: options.signal,
      });

      if (!response.ok) {
        return {
          success: false,
          error: `Failed to push manifest: ${response.status} ${response.statusText}`,
        };
      }

      return {
        success: true,
        digest: response.headers.get("docker-content-digest") ?? sha256Digest(body),
      };
    } catch (err) {
      return { success: false, error: `Failed to push manifest: ${errorMessage(err)}` };
    }
  }
}
