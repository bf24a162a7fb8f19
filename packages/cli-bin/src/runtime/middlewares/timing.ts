import { formatTiming, TimingTracker } from "@qprof/cli-core";
import type { MiddlewareConfig } from "@qprof/cli-runtime";

export function createTimingMiddleware(now?: () => number): MiddlewareConfig {
  return {
    name: "timing",
    priority: 100,
    middleware: async (ctx, next) => {
      const tracker = new TimingTracker(now);
      const result = await next();
      const total = tracker.total();

      ctx.diagnostics.push(`runtime: ${formatTiming(total)}`);
      ctx.logger.debug(`[runtime] command executed in ${total}ms`, { exitCode: result });

      return result;
    },
  };
}
