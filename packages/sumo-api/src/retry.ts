export type HttpMethod = "GET" | "HEAD" | "OPTIONS" | "POST" | "PUT" | "DELETE";

export interface RetryOptions {
  /** Total attempts, the first one included. */
  attempts: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY: RetryOptions = {
  attempts: 10,
  baseDelayMs: 500,
  factor: 2,
  maxDelayMs: 30_000,
};

const RETRYABLE_METHODS: ReadonlySet<HttpMethod> = new Set(["GET", "HEAD", "OPTIONS"]);
const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export function isRetryableMethod(method: HttpMethod): boolean {
  return RETRYABLE_METHODS.has(method);
}

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUSES.has(status);
}

/** Delay before the attempt that follows `attempt` (1-based). */
export function backoffDelay(attempt: number, options: RetryOptions): number {
  const delay = options.baseDelayMs * options.factor ** (attempt - 1);
  return Math.min(delay, options.maxDelayMs);
}

/** Retry-After in seconds; HTTP dates are not sent by the API. */
export function parseRetryAfter(value: string | null, options: RetryOptions): number | undefined {
  if (value === null || value.trim() === "") {
    return undefined;
  }
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) {
    return undefined;
  }
  return Math.min(seconds * 1000, options.maxDelayMs);
}
