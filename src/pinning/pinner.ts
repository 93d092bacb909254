/**
 * Reference pinner
 *
 * Rewrites every service image in a descriptor to its digest-pinned form.
 * Not atomic: when a service fails, the ones before it stay pinned.
 */

import { ImageReferenceError } from "#/core";
import type { AppDescriptor } from "#/schemas";
import {
  expandDefaultPlaceholder,
  formatImageReference,
  isTagged,
  parseImageReference,
  pinReference,
} from "#/reference";
import type { DigestResolver, PinOptions } from "./pinning.types";

/**
 * Pin each service image in `descriptor.services`, in key order.
 *
 * @example
 * // services.web.image: "nginx:stable"
 * await pinServiceImages(descriptor, createRegistryResolver(registries));
 * // services.web.image: "docker.io/library/nginx@sha256:…"
 */
export async function pinServiceImages(
  descriptor: AppDescriptor,
  resolver: DigestResolver,
  options: PinOptions = {}
): Promise<void> {
  const { onProgress, logger, signal } = options;

  for (const [name, service] of Object.entries(descriptor.services)) {
    const image = service.image;
    onProgress?.({ type: "pin-started", service: name, image });

    const ref = parseImageReference(expandDefaultPlaceholder(image));
    if (!isTagged(ref)) {
      throw new ImageReferenceError(
        image,
        `Invalid image reference(${image}): Images must be tagged. e.g ${image}:stable`
      );
    }

    logger?.debug("Resolving image digest", { service: name, image: formatImageReference(ref) });
    const { digest, platforms } = await resolver.resolve(ref, { signal });

    const pinned = formatImageReference(pinReference(ref, digest));
    service.image = pinned;

    onProgress?.({ type: "service-pinned", service: name, image, platforms, pinned });
  }
}
