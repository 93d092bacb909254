/**
 * Publish module
 *
 * Uploads a bundle archive and tags a manifest referencing it.
 */

export { publishBundle, buildBundleManifest } from "./publisher";
export { createApp } from "./app";
export type { CreateAppOptions } from "./app";
export type { PublishContext, PublishOptions, PublishResult } from "./publish.types";
