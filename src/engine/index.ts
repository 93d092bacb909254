/**
 * Engine module
 *
 * Digest resolution through a local container engine.
 */

export { EngineClient } from "./engine-client";
export type { EngineClientConfig, DistributionInspectResult } from "./engine.types";
