/**
 * Image reference types
 *
 * A normalized reference always carries an explicit domain and full path:
 * "nginx:stable" becomes { domain: "docker.io", path: "library/nginx", tag: "stable" }.
 */

export interface ImageReference {
  /** Registry domain, with optional port (e.g., docker.io, localhost:5000) */
  domain: string;
  /** Repository path inside the registry (e.g., library/nginx) */
  path: string;
  tag?: string;
  /** Content digest (e.g., sha256:abc123...) */
  digest?: string;
}

export type TaggedImageReference = ImageReference & { tag: string };

export type PinnedImageReference = Omit<ImageReference, "tag"> & { digest: string };
