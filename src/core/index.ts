export * from "./interfaces";
export * from "./errors";
export { createNodeFileSystem, createFetchHttpClient, createEnvTokenProvider } from "./node";
