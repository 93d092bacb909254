export { loadEngineConfig, parseEngineConfig, findEngineConfig, defaultEngineConfig } from "./config";
