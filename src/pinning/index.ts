/**
 * Pinning module
 *
 * Tag → digest resolution for every service in an app descriptor.
 */

export { pinServiceImages } from "./pinner";
export { createRegistryResolver, createEngineResolver, createDigestResolver } from "./resolvers";
export type { DigestResolver, ResolvedDigest, PinOptions } from "./pinning.types";
