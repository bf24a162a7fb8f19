// Error handling
export {
  EXIT_CODES,
  CLI_ERROR_CODES,
  CliError,
  mapCliErrorToExitCode,
  isCliError,
  isCliErrorCode,
  serializeCliError,
  errorMessage,
  type CliErrorCode,
  type SerializedCliError,
} from "./errors";

// Argv and flags
export * from "./flags";

// Context and configuration
export * from "./context";
export * from "./config";

// Logging
export * from "./logging";

// Presenters
export * from "./presenter/types";
export * from "./presenter/text";
export * from "./presenter/json";
export * from "./presenter/failure";
export * from "./presenter/colors";
export * from "./presenter/box";
export * from "./presenter/timing";
