export { createLogger, createProgressReporter, LogLevelSchema } from "./logger";
export type { LoggerOptions, LogLevel } from "./logger";
