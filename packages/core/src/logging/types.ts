export type LogLevel =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "fatal"
  | "silent";

/**
 * Destination for formatted log lines. Error and fatal entries go to
 * `stderr`, everything else to `stdout`.
 */
export interface LogSink {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  name?: string;
  timestamp?: boolean;
  json?: boolean;
  sink?: LogSink;
}

export interface Logger {
  readonly level: LogLevel;
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  fatal(msg: string, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}
