import { CliError, CLI_ERROR_CODES } from "@qprof/cli-core";

const BODY_PREVIEW_MAX = 500;

export interface SumoApiErrorDetails {
  method: string;
  path: string;
  status?: number;
  body?: string;
}

export class SumoApiError extends CliError {
  readonly method: string;
  readonly path: string;
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, details: SumoApiErrorDetails) {
    const auth = details.status === 401 || details.status === 403;
    super(auth ? CLI_ERROR_CODES.E_API_AUTH : CLI_ERROR_CODES.E_API_HTTP, message, details);
    this.name = "SumoApiError";
    this.method = details.method;
    this.path = details.path;
    this.status = details.status;
    this.body = details.body;
  }

  static fromResponse(method: string, path: string, status: number, body: string): SumoApiError {
    const preview = body.length > BODY_PREVIEW_MAX ? body.slice(0, BODY_PREVIEW_MAX) : body;
    const suffix = preview.trim() ? `: ${preview.trim()}` : "";
    return new SumoApiError(`${method} ${path} failed with HTTP ${status}${suffix}`, {
      method,
      path,
      status,
      body,
    });
  }
}
