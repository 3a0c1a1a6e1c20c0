import os from "node:os";

type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";
type LogContext = Record<string, unknown>;

const LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const SENSITIVE_KEYS = ["password", "token", "secret", "authorization", "cookie", "email", "jwt"];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_VALUES;
}

function isSensitive(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYS.some((s) => lower.includes(s));
}

function isPlainObject(value: unknown): value is LogContext {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function redact(context: LogContext): LogContext {
  const result: LogContext = {};

  for (const [key, value] of Object.entries(context)) {
    if (value === undefined || value === null) continue;

    if (isSensitive(key)) {
      result[key] = Array.isArray(value)
        ? value.map((item) => (typeof item === "string" ? "***" : item))
        : "***";
      continue;
    }

    if (value instanceof Error) {
      result[key] = { name: value.name, message: value.message };
    } else if (isPlainObject(value)) {
      result[key] = redact(value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  fatal(message: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly bindings: LogContext,
    private readonly minLevel: LogLevel,
    private readonly json: boolean
  ) {}

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log("error", message, context);
  }

  fatal(message: string, context?: LogContext): void {
    this.log("fatal", message, context);
  }

  child(bindings: LogContext): Logger {
    return new ConsoleLogger({ ...this.bindings, ...bindings }, this.minLevel, this.json);
  }

  private log(level: LogLevel, message: string, context: LogContext = {}): void {
    if (LEVEL_VALUES[level] < LEVEL_VALUES[this.minLevel]) return;

    const timestamp = new Date().toISOString();
    const sanitized = redact({ ...this.bindings, ...context });

    let line: string;
    if (this.json) {
      line = JSON.stringify({
        timestamp,
        level: LEVEL_VALUES[level],
        levelName: level,
        message,
        hostname: os.hostname(),
        pid: process.pid,
        ...sanitized,
      });
    } else {
      const serialized = Object.keys(sanitized).length > 0 ? ` ${JSON.stringify(sanitized)}` : "";
      line = `[${timestamp}] [${level.toUpperCase()}] ${message}${serialized}`;
    }

    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      default:
        console.error(line);
    }
  }
}

export type { LogContext };

// Read straight from process.env: the logger is imported by config code and
// must not depend on env validation.
const nodeEnv = process.env.NODE_ENV || "development";
const configuredLevel = process.env.LOG_LEVEL;
const minLevel: LogLevel = isLogLevel(configuredLevel)
  ? configuredLevel
  : nodeEnv === "production"
    ? "info"
    : "debug";

const logger: Logger = new ConsoleLogger({ service: "cruxclip", env: nodeEnv }, minLevel, nodeEnv === "production");

export function createChildLogger(bindings: LogContext): Logger {
  return logger.child(bindings);
}

export default logger;
