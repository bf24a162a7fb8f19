import { CliError, errorMessage } from "../errors";

export interface FailurePayload {
  ok: false;
  error: { code?: string; message: string; details?: unknown };
  warnings?: string[];
}

/** Envelope printed on stdout in --json mode when a command cannot finish. */
export function failurePayload(error: unknown, warnings: readonly string[] = []): FailurePayload {
  const body =
    error instanceof CliError
      ? {
          code: error.code,
          message: error.message,
          ...(error.details != null ? { details: error.details } : {}),
        }
      : { message: errorMessage(error) };
  return { ok: false, error: body, ...(warnings.length > 0 ? { warnings: [...warnings] } : {}) };
}

export function failureLine(error: unknown): string {
  return error instanceof CliError ? `${error.code}: ${error.message}` : errorMessage(error);
}
