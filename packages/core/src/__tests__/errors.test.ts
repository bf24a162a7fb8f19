import { describe, it, expect } from "vitest";
import {
  CLI_ERROR_CODES,
  EXIT_CODES,
  mapCliErrorToExitCode,
  CliError,
  isCliError,
  serializeCliError,
} from "../errors";

describe("CLI Errors", () => {
  describe("mapCliErrorToExitCode", () => {
    it("should map config errors to CONFIG exit code", () => {
      expect(mapCliErrorToExitCode(CLI_ERROR_CODES.E_CONFIG)).toBe(EXIT_CODES.CONFIG);
      expect(mapCliErrorToExitCode(CLI_ERROR_CODES.E_ENV_MISSING_VAR)).toBe(EXIT_CODES.CONFIG);
      expect(mapCliErrorToExitCode(CLI_ERROR_CODES.E_SECRET_RESOLVE)).toBe(EXIT_CODES.CONFIG);
    });

    it("should map usage errors to USAGE exit code", () => {
      expect(mapCliErrorToExitCode(CLI_ERROR_CODES.E_INVALID_FLAGS)).toBe(EXIT_CODES.USAGE);
      expect(mapCliErrorToExitCode(CLI_ERROR_CODES.E_INVALID_RANGE)).toBe(EXIT_CODES.USAGE);
      expect(mapCliErrorToExitCode(CLI_ERROR_CODES.E_INVALID_TARGET)).toBe(EXIT_CODES.USAGE);
      expect(mapCliErrorToExitCode(CLI_ERROR_CODES.E_CMD_NOT_FOUND)).toBe(EXIT_CODES.USAGE);
    });

    it("should map IO errors to IO exit code", () => {
      expect(mapCliErrorToExitCode(CLI_ERROR_CODES.E_IO_READ)).toBe(EXIT_CODES.IO);
      expect(mapCliErrorToExitCode(CLI_ERROR_CODES.E_IO_WRITE)).toBe(EXIT_CODES.IO);
    });

    it("should map API errors", () => {
      expect(mapCliErrorToExitCode(CLI_ERROR_CODES.E_API_AUTH)).toBe(77);
      expect(mapCliErrorToExitCode(CLI_ERROR_CODES.E_API_HTTP)).toBe(69);
      expect(mapCliErrorToExitCode(CLI_ERROR_CODES.E_QUERY_FAILED)).toBe(70);
    });
  });

  describe("CliError", () => {
    it("should create error with code, message and details", () => {
      const details = { path: "/tmp/file.txt" };
      const error = new CliError(CLI_ERROR_CODES.E_IO_READ, "File not found", details);

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe("CliError");
      expect(error.code).toBe(CLI_ERROR_CODES.E_IO_READ);
      expect(error.message).toBe("File not found");
      expect(error.details).toBe(details);
      expect(error.stack).toContain("CliError");
    });
  });

  describe("isCliError", () => {
    it("should accept CliError instances and look-alikes", () => {
      expect(isCliError(new CliError(CLI_ERROR_CODES.E_IO_READ, "x"))).toBe(true);
      expect(isCliError({ code: CLI_ERROR_CODES.E_API_HTTP, message: "x" })).toBe(true);
    });

    it("should reject anything else", () => {
      expect(isCliError({ code: "INVALID_CODE" })).toBe(false);
      expect(isCliError({ message: "x" })).toBe(false);
      expect(isCliError(new Error("x"))).toBe(false);
      expect(isCliError(null)).toBe(false);
      expect(isCliError("E_IO_READ")).toBe(false);
    });
  });

  describe("serializeCliError", () => {
    it("should serialize CliError without stack", () => {
      const error = new CliError(CLI_ERROR_CODES.E_IO_READ, "File not found", { path: "/tmp" });

      expect(serializeCliError(error)).toEqual({
        name: "CliError",
        message: "File not found",
        code: CLI_ERROR_CODES.E_IO_READ,
        details: { path: "/tmp" },
      });
    });

    it("should include stack on request", () => {
      const serialized = serializeCliError(new Error("boom"), { includeStack: true });

      expect(serialized.name).toBe("Error");
      expect(serialized.message).toBe("boom");
      expect(serialized.stack).toBeDefined();
    });

    it("should serialize non-errors", () => {
      expect(serializeCliError("plain")).toEqual({ name: "Error", message: "plain" });
    });
  });
});
