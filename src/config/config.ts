/**
 * Engine configuration
 *
 * `.composeapp.yaml` holds registry credentials and workflow defaults.
 * A missing file is not an error: every field has a default.
 */

import { dirname, join } from "path";
import { ConfigError, type FileSystem } from "#/core";
import { CONFIG_FILENAME } from "#/constants";
import { safeParseYaml } from "#/friendly-errors";
import { EngineConfigSchema, type EngineConfig } from "#/schemas";

export function defaultEngineConfig(): EngineConfig {
  return EngineConfigSchema.parse({});
}

/**
 * Parse and validate engine config from raw YAML content.
 */
export function parseEngineConfig(content: string, filepath?: string): EngineConfig {
  const result = safeParseYaml(content, EngineConfigSchema, filepath);
  if (!result.success) {
    throw new ConfigError(result.error.message, result.error.details);
  }
  return result.data;
}

/**
 * Find the config file by walking up from a directory.
 * Returns undefined if there is none.
 */
export function findEngineConfig(fs: FileSystem, startDir: string): string | undefined {
  let current = startDir;

  while (true) {
    const candidate = join(current, CONFIG_FILENAME);
    if (fs.exists(candidate)) {
      return candidate;
    }
    const parent = dirname(current);
    if (parent === current) return undefined;
    current = parent;
  }
}

/**
 * Load engine config from `path`, falling back to defaults when the file
 * does not exist.
 */
export function loadEngineConfig(fs: FileSystem, path: string): EngineConfig {
  if (!fs.exists(path)) {
    return defaultEngineConfig();
  }
  return parseEngineConfig(fs.readFile(path), path);
}
