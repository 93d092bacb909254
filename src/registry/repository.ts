/**
 * OCI-backed repository
 */

import type { OciClient, OciManifest, RequestOptions } from "#/oci";
import type { RegistryRepository } from "./registry.types";

export class OciRepository implements RegistryRepository {
  readonly reference: string;
  private client: OciClient;
  private name: string;

  /**
   * @param name - Repository path on the registry (e.g., "library/nginx")
   */
  constructor(client: OciClient, domain: string, name: string) {
    this.client = client;
    this.name = name;
    this.reference = `${domain}/${name}`;
  }

  getTagDescriptor(tag: string, options?: RequestOptions) {
    return this.client.getTagDescriptor(this.name, tag, options);
  }

  getManifest(digest: string, options?: RequestOptions) {
    return this.client.getManifest(this.name, digest, options);
  }

  putBlob(mediaType: string, data: Buffer, options?: RequestOptions) {
    return this.client.putBlob(this.name, mediaType, data, options);
  }

  putManifest(manifest: OciManifest, tag: string, options?: RequestOptions) {
    return this.client.putManifest(this.name, manifest, tag, options);
  }
}
