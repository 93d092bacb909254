/**
 * Image reference parsing
 *
 * Normalizes image strings the way the Docker CLI does, so that
 * "nginx", "library/nginx" and "docker.io/library/nginx" all name the
 * same repository.
 */

import { ImageReferenceError } from "#/core";
import {
  DEFAULT_DOMAIN,
  LEGACY_DEFAULT_DOMAIN,
  OFFICIAL_REPO_PREFIX,
  DEFAULT_TAG,
} from "#/constants";
import type {
  ImageReference,
  PinnedImageReference,
  TaggedImageReference,
} from "./reference.types";

const DOMAIN_COMPONENT = "(?:[a-zA-Z0-9]|[a-zA-Z0-9][a-zA-Z0-9-]*[a-zA-Z0-9])";
const DOMAIN_REGEX = new RegExp(`^${DOMAIN_COMPONENT}(?:\\.${DOMAIN_COMPONENT})*(?::[0-9]+)?$`);
const PATH_COMPONENT_REGEX = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;
const TAG_REGEX = /^[\w][\w.-]{0,127}$/;
const DIGEST_REGEX = /^[A-Za-z][A-Za-z0-9]*(?:[-_+.][A-Za-z][A-Za-z0-9]*)*:[0-9a-fA-F]{32,}$/;
const IDENTIFIER_REGEX = /^[a-f0-9]{64}$/;
const NAME_MAX_LENGTH = 255;

/**
 * Split the leading registry domain off a repository name.
 * The first component is only a domain if it looks like a host:
 * it contains "." or ":" or is "localhost".
 */
function splitDomain(name: string): { domain: string; remainder: string } {
  const slash = name.indexOf("/");
  const first = slash === -1 ? "" : name.slice(0, slash);

  if (
    slash === -1 ||
    (!first.includes(".") && !first.includes(":") && first !== "localhost" && first.toLowerCase() === first)
  ) {
    return { domain: DEFAULT_DOMAIN, remainder: name };
  }

  return { domain: first, remainder: name.slice(slash + 1) };
}

/**
 * Parse an image string into a normalized reference.
 *
 * @example
 * parseImageReference("nginx:stable")
 *   → { domain: "docker.io", path: "library/nginx", tag: "stable" }
 * parseImageReference("localhost:5000/team/app@sha256:…")
 *   → { domain: "localhost:5000", path: "team/app", digest: "sha256:…" }
 */
export function parseImageReference(input: string): ImageReference {
  const fail = (reason: string): never => {
    throw new ImageReferenceError(input, `Invalid image reference(${input}): ${reason}`);
  };

  if (!input) fail("reference is empty");
  if (IDENTIFIER_REGEX.test(input)) {
    fail("cannot specify 64-byte hexadecimal strings");
  }

  let rest = input;
  let digest: string | undefined;
  const at = rest.indexOf("@");
  if (at !== -1) {
    digest = rest.slice(at + 1);
    rest = rest.slice(0, at);
    if (!DIGEST_REGEX.test(digest)) fail("invalid digest format");
  }

  let tag: string | undefined;
  const colon = rest.lastIndexOf(":");
  if (colon > rest.lastIndexOf("/")) {
    tag = rest.slice(colon + 1);
    rest = rest.slice(0, colon);
    if (!TAG_REGEX.test(tag)) fail("invalid tag format");
  }

  const split = splitDomain(rest);
  let { domain, remainder } = split;
  if (domain === LEGACY_DEFAULT_DOMAIN) domain = DEFAULT_DOMAIN;
  if (domain === DEFAULT_DOMAIN && !remainder.includes("/")) {
    remainder = `${OFFICIAL_REPO_PREFIX}${remainder}`;
  }

  if (remainder.toLowerCase() !== remainder) fail("repository name must be lowercase");
  if (!DOMAIN_REGEX.test(domain)) fail(`invalid domain "${domain}"`);
  if (!remainder.split("/").every((part) => PATH_COMPONENT_REGEX.test(part))) {
    fail("invalid reference format");
  }
  if (domain.length + 1 + remainder.length > NAME_MAX_LENGTH) {
    fail(`repository name must not be more than ${NAME_MAX_LENGTH} characters`);
  }

  const reference: ImageReference = { domain, path: remainder };
  if (tag !== undefined) reference.tag = tag;
  if (digest !== undefined) reference.digest = digest;
  return reference;
}

/**
 * Repository name: domain + path, without tag or digest.
 */
export function repositoryName(ref: ImageReference): string {
  return `${ref.domain}/${ref.path}`;
}

export function formatImageReference(ref: ImageReference): string {
  let result = repositoryName(ref);
  if (ref.tag) result += `:${ref.tag}`;
  if (ref.digest) result += `@${ref.digest}`;
  return result;
}

export function isTagged(ref: ImageReference): ref is TaggedImageReference {
  return ref.tag !== undefined;
}

/**
 * Return the reference with `tag` defaulted whenever it has no tag.
 * A digest is kept as it is and does not count as a tag.
 */
export function withTagOrDefault(ref: ImageReference, tag: string = DEFAULT_TAG): TaggedImageReference {
  return { ...ref, tag: ref.tag ?? tag };
}

/**
 * Replace the tag with a digest. Domain and path are kept exactly.
 */
export function pinReference(ref: ImageReference, digest: string): PinnedImageReference {
  return { domain: ref.domain, path: ref.path, digest };
}

const PLACEHOLDER_REGEX = /^\$\{[A-Za-z_][A-Za-z0-9_]*:?-(.*)\}$/;

/**
 * Compatibility shim for image strings written as `${VAR-default}` or
 * `${VAR:-default}`. The variable is never looked up: the default wins.
 * Strings not starting with "$" are returned unchanged.
 */
export function expandDefaultPlaceholder(image: string): string {
  if (!image.startsWith("$")) return image;

  if (!image.startsWith("${") || !image.endsWith("}")) {
    throw new ImageReferenceError(
      image,
      `Invalid image reference(${image}). This does not look like a properly formatted \${variable-defval}`
    );
  }

  const match = image.match(PLACEHOLDER_REGEX);
  if (!match || !match[1]) {
    throw new ImageReferenceError(
      image,
      `Invalid image reference(${image}). Variable does not appear to have a default value`
    );
  }

  return match[1];
}
