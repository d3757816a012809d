export { createLogger, isLogger, silentLogger } from "~/logging/logger.ts";
export type { LogLevel, Logger, LoggerConfig, LogSink } from "~/logging/types.ts";
