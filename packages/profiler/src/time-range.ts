import { CliError, CLI_ERROR_CODES } from "@qprof/cli-core";

// ─── Relative spans ─────────────────────────────────────────────────────────

export const TIME_UNITS: Record<string, number> = {
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
  w: 604_800_000,
};

export const DEFAULT_RANGE = "1h";

export interface TimeRange {
  from: number;
  to: number;
  timeZone: "UTC";
  byReceiptTime: false;
}

/**
 * Span length in ms. A leading "-" is accepted and ignored: "-2h" and "2h"
 * both look two hours back.
 */
export function parseSpan(span: string): number {
  const match = span.trim().match(/^-?(\d+)([smhdw])$/);
  const digits = match?.[1];
  const unit = match?.[2];
  const ms = unit === undefined ? undefined : TIME_UNITS[unit];
  if (digits === undefined || ms === undefined) {
    throw new CliError(
      CLI_ERROR_CODES.E_INVALID_RANGE,
      `Invalid time span "${span}". Use <number><s|m|h|d|w>, e.g. 15m or 2d`,
    );
  }
  return parseInt(digits, 10) * ms;
}

/**
 * "<span>" ends now; "<offset>:<span>" ends <offset> ago. Either way the
 * window is <span> long. `nowMs` is truncated to whole seconds.
 */
export function calculateRange(spec: string = DEFAULT_RANGE, nowMs: number = Date.now()): TimeRange {
  const now = Math.floor(nowMs / 1000) * 1000;
  const parts = spec.split(":");
  if (parts.length > 2) {
    throw new CliError(
      CLI_ERROR_CODES.E_INVALID_RANGE,
      `Invalid range "${spec}". Use <span> or <offset>:<span>`,
    );
  }
  const [first = "", second] = parts;
  const to = second === undefined ? now : now - parseSpan(first);
  const from = to - parseSpan(second ?? first);
  return { from, to, timeZone: "UTC", byReceiptTime: false };
}
