import type {
  LogLevel,
  Logger,
  LoggerConfig,
  LogSink,
} from "~/logging/types.ts";

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: Infinity,
};

const processSink: LogSink = {
  stdout: (line) => {
    process.stdout.write(line);
  },
  stderr: (line) => {
    process.stderr.write(line);
  },
};

const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
};

const levelColors: Record<LogLevel, string> = {
  trace: colors.gray,
  debug: colors.blue,
  info: colors.green,
  warn: colors.yellow,
  error: colors.red,
  fatal: colors.magenta,
  silent: "",
};

function formatTime(timestamp: number): string {
  const date = new Date(timestamp);
  const h = date.getHours().toString().padStart(2, "0");
  const m = date.getMinutes().toString().padStart(2, "0");
  const s = date.getSeconds().toString().padStart(2, "0");
  const ms = date.getMilliseconds().toString().padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
}

interface LogEntry {
  level: LogLevel;
  time: number;
  msg: string;
  [key: string]: unknown;
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  return JSON.stringify(value);
}

function formatPretty(
  entry: LogEntry,
  name: string | undefined,
  showTimestamp: boolean,
): string {
  const { level, time, msg, ...rest } = entry;
  const color = levelColors[level];
  const levelStr = level.toUpperCase().padEnd(5);

  let line = "";

  if (showTimestamp) {
    line += `${colors.gray}${formatTime(time)}${colors.reset} `;
  }

  if (name) {
    line += `${colors.cyan}${colors.bold}[${name}]${colors.reset} `;
  }

  line += `${color}${levelStr}${colors.reset} ${msg}`;

  const keys = Object.keys(rest);
  if (keys.length > 0) {
    const extra = keys
      .map((k) => `${colors.dim}${k}=${colors.reset}${formatValue(rest[k])}`)
      .join(" ");
    line += ` ${extra}`;
  }

  return line + "\n";
}

function formatJson(entry: LogEntry, name: string | undefined): string {
  const obj: Record<string, unknown> = { ...entry };
  if (name) obj.name = name;
  for (const key of Object.keys(obj)) {
    const value = obj[key];
    if (value instanceof Error) {
      obj[key] = { name: value.name, message: value.message, stack: value.stack };
    }
  }
  return JSON.stringify(obj) + "\n";
}

/**
 * Create a leveled logger writing pretty or JSON lines.
 *
 * @example
 * ```typescript
 * const log = createLogger({ name: "app", level: "debug" });
 * log.info("listening", { port: 8000 });
 * log.child({ name: "request" }).warn("slow"); // [app:request] WARN  slow
 * ```
 */
export function createLogger(
  options: LoggerConfig = {},
  bindings: Record<string, unknown> = {},
): Logger {
  const currentLevel = options.level ?? "info";
  const name = options.name;
  const showTimestamp = options.timestamp ?? true;
  const jsonMode = options.json ?? false;
  const sink = options.sink ?? processSink;

  const shouldLog = (level: LogLevel): boolean => {
    return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
  };

  const log = (
    level: LogLevel,
    msg: string,
    data?: Record<string, unknown>,
  ): void => {
    if (!shouldLog(level)) return;

    const entry: LogEntry = {
      ...bindings,
      ...data,
      level,
      time: Date.now(),
      msg,
    };

    const output = jsonMode
      ? formatJson(entry, name)
      : formatPretty(entry, name, showTimestamp);

    if (level === "error" || level === "fatal") {
      sink.stderr(output);
    } else {
      sink.stdout(output);
    }
  };

  return {
    level: currentLevel,
    trace(msg, data) {
      log("trace", msg, data);
    },
    debug(msg, data) {
      log("debug", msg, data);
    },
    info(msg, data) {
      log("info", msg, data);
    },
    warn(msg, data) {
      log("warn", msg, data);
    },
    error(msg, data) {
      log("error", msg, data);
    },
    fatal(msg, data) {
      log("fatal", msg, data);
    },
    child(childBindings) {
      const { name: childName, ...rest } = childBindings;
      const fullName = childName === undefined
        ? name
        : name
        ? `${name}:${String(childName)}`
        : String(childName);

      return createLogger(
        {
          level: currentLevel,
          name: fullName,
          timestamp: showTimestamp,
          json: jsonMode,
          sink,
        },
        { ...bindings, ...rest },
      );
    },
  };
}

/**
 * Logger that drops everything.
 */
export function silentLogger(): Logger {
  return createLogger({ level: "silent" });
}

export function isLogger(value: unknown): value is Logger {
  return (
    typeof value === "object" &&
    value !== null &&
    "info" in value &&
    "error" in value &&
    "child" in value &&
    typeof value.info === "function" &&
    typeof value.error === "function" &&
    typeof value.child === "function"
  );
}
