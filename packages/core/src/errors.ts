export const CLI_ERROR_CODES = {
  E_IO_READ: "E_IO_READ",
  E_IO_WRITE: "E_IO_WRITE",
  E_ENV_MISSING_VAR: "E_ENV_MISSING_VAR",
  E_INVALID_FLAGS: "E_INVALID_FLAGS",
  E_INVALID_RANGE: "E_INVALID_RANGE",
  E_INVALID_TARGET: "E_INVALID_TARGET",
  E_CONFIG: "E_CONFIG",
  E_SECRET_RESOLVE: "E_SECRET_RESOLVE",
  E_API_AUTH: "E_API_AUTH",
  E_API_HTTP: "E_API_HTTP",
  E_QUERY_FAILED: "E_QUERY_FAILED",
  E_CMD_NOT_FOUND: "E_CMD_NOT_FOUND",
} as const;

export type CliErrorCode = typeof CLI_ERROR_CODES[keyof typeof CLI_ERROR_CODES];

export const EXIT_CODES = {
  GENERIC: 1,      // generic runtime/software error
  USAGE: 64,       // EX_USAGE per sysexits.h
  UNAVAILABLE: 69, // EX_UNAVAILABLE per sysexits.h
  SOFTWARE: 70,    // EX_SOFTWARE per sysexits.h
  IO: 74,          // EX_IOERR per sysexits.h
  NOPERM: 77,      // EX_NOPERM per sysexits.h
  CONFIG: 78,      // EX_CONFIG per sysexits.h
} as const;

const ERROR_CODE_SET: ReadonlySet<string> = new Set<string>(Object.values(CLI_ERROR_CODES));

export const mapCliErrorToExitCode = (code: CliErrorCode): number => {
  switch (code) {
    case CLI_ERROR_CODES.E_CONFIG:
    case CLI_ERROR_CODES.E_ENV_MISSING_VAR:
    case CLI_ERROR_CODES.E_SECRET_RESOLVE:
      return EXIT_CODES.CONFIG;

    case CLI_ERROR_CODES.E_INVALID_FLAGS:
    case CLI_ERROR_CODES.E_INVALID_RANGE:
    case CLI_ERROR_CODES.E_INVALID_TARGET:
    case CLI_ERROR_CODES.E_CMD_NOT_FOUND:
      return EXIT_CODES.USAGE;

    case CLI_ERROR_CODES.E_IO_READ:
    case CLI_ERROR_CODES.E_IO_WRITE:
      return EXIT_CODES.IO;

    case CLI_ERROR_CODES.E_API_AUTH:
      return EXIT_CODES.NOPERM;

    case CLI_ERROR_CODES.E_API_HTTP:
      return EXIT_CODES.UNAVAILABLE;

    case CLI_ERROR_CODES.E_QUERY_FAILED:
      return EXIT_CODES.SOFTWARE;

    default:
      return EXIT_CODES.GENERIC;
  }
};

export class CliError extends Error {
  code: CliErrorCode;
  details?: unknown;

  constructor(code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "CliError";
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export function isCliErrorCode(value: unknown): value is CliErrorCode {
  return typeof value === "string" && ERROR_CODE_SET.has(value);
}

export function isCliError(err: unknown): err is CliError {
  if (err instanceof CliError) return true;
  if (!err || typeof err !== "object") return false;
  return "code" in err && isCliErrorCode(err.code);
}

export interface SerializedCliError {
  name: string;
  message: string;
  code?: string;
  details?: unknown;
  stack?: string;
}

export function serializeCliError(
  err: unknown,
  opts: { includeStack?: boolean } = {}
): SerializedCliError {
  const includeStack = !!opts.includeStack;
  if (err instanceof CliError) {
    return {
      name: "CliError",
      message: err.message,
      code: err.code,
      ...(err.details !== undefined ? { details: err.details } : {}),
      ...(includeStack && err.stack ? { stack: err.stack } : {}),
    };
  }
  if (err instanceof Error) {
    return {
      name: err.name || "Error",
      message: err.message,
      ...(includeStack && err.stack ? { stack: err.stack } : {}),
    };
  }
  return { name: "Error", message: String(err) };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
