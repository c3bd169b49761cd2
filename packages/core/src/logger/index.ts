export { createLogger, isLogLevel, silentLogger, LOG_LEVELS } from "./logger";
export type { Logger, LogLevel } from "./logger";
