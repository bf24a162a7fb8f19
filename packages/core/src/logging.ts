import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";
import type { LogLevelName } from "./flags";

export type LogLevel = LogLevelName;
export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(msg: string, meta?: LogContext): void;
  info(msg: string, meta?: LogContext): void;
  warn(msg: string, meta?: LogContext): void;
  error(msg: string, meta?: LogContext | Error): void;
  child(bindings: { category?: string; meta?: LogContext }): Logger;
}

export interface InitLoggingOptions {
  level: LogLevel;
  /** Defaults to a synchronous stderr stream so stdout stays clean for --json. */
  destination?: DestinationStream;
}

const SECRET_KEYS = ["accessKey", "apiKey", "apikey", "secret", "password", "authorization"];

const REDACT_PATHS = [
  ...SECRET_KEYS,
  ...SECRET_KEYS.map((key) => `*.${key}`),
  "headers.cookie",
];

let root: PinoLogger | undefined;

export function initLogging(options: InitLoggingOptions): PinoLogger {
  root = pino(
    {
      level: options.level,
      base: null,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
      redact: { paths: REDACT_PATHS, censor: "[redacted]" },
    },
    options.destination ?? pino.destination({ dest: 2, sync: true })
  );
  return root;
}

function getRoot(): PinoLogger {
  return root ?? initLogging({ level: getLogLevel() });
}

function toLogger(base: PinoLogger): Logger {
  return {
    debug: (msg, meta) => (meta ? base.debug(meta, msg) : base.debug(msg)),
    info: (msg, meta) => (meta ? base.info(meta, msg) : base.info(msg)),
    warn: (msg, meta) => (meta ? base.warn(meta, msg) : base.warn(msg)),
    error: (msg, metaOrError) => {
      if (metaOrError instanceof Error) {
        base.error({ err: metaOrError }, msg);
        return;
      }
      if (metaOrError) {
        base.error(metaOrError, msg);
        return;
      }
      base.error(msg);
    },
    child: (bindings) => {
      const merged: LogContext = {};
      if (bindings.category) {
        merged.category = bindings.category;
      }
      if (bindings.meta) {
        Object.assign(merged, bindings.meta);
      }
      return toLogger(base.child(merged));
    },
  };
}

export function getLogger(category = "cli"): Logger {
  return toLogger(getRoot().child({ layer: "cli", category }));
}

export function createNoOpLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    child: () => createNoOpLogger(),
  };
}

export function parseLogLevel(raw: unknown): LogLevel | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  switch (raw.toLowerCase()) {
    case "trace":
      return "trace";
    case "debug":
      return "debug";
    case "info":
      return "info";
    case "warn":
      return "warn";
    case "error":
      return "error";
    case "silent":
      return "silent";
    default:
      return undefined;
  }
}

export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  return parseLogLevel(env.QPROF_LOG_LEVEL ?? env.LOG_LEVEL) ?? "info";
}
