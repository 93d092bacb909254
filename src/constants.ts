/**
 * Global constants for the compose app bundler
 */

export const DEFAULT_DOMAIN = "docker.io";
export const LEGACY_DEFAULT_DOMAIN = "index.docker.io";
// docker.io is an alias; the Distribution API lives on this host
export const DEFAULT_REGISTRY_API_HOST = "registry-1.docker.io";
export const OFFICIAL_REPO_PREFIX = "library/";
export const DEFAULT_TAG = "latest";

// Canonical descriptor name inside a bundle; always replaced by the pinned content
export const DESCRIPTOR_FILENAME = "docker-compose.yml";
export const IGNORE_FILENAME = ".composeappignores";

export const DEFAULT_ENGINE_HOST = "http://localhost:2375";
export const USER_AGENT = "compose-app-bundler";

// Engine configuration, looked up from the bundle root upwards
export const CONFIG_FILENAME = ".composeapp.yaml";
