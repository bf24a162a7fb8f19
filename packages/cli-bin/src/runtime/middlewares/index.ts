import type { MiddlewareConfig } from "@qprof/cli-runtime";
import { createTimingMiddleware } from "./timing";

export function getDefaultMiddlewares(): MiddlewareConfig[] {
  return [createTimingMiddleware()];
}
