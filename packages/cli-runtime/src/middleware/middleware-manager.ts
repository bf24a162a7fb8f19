/**
 * @module @qprof/cli-runtime/middleware/middleware-manager
 * Middleware chain management
 */

import type { CliContext } from "@qprof/cli-core";

export type CommandMiddleware = (
  ctx: CliContext,
  next: () => Promise<number>,
) => Promise<number>;

export interface MiddlewareConfig {
  name: string;
  priority: number; // lower = runs earlier
  middleware: CommandMiddleware;
}

export class MiddlewareManager {
  private middlewares: MiddlewareConfig[] = [];

  register(config: MiddlewareConfig): void {
    this.middlewares = this.middlewares.filter((m) => m.name !== config.name);
    this.middlewares.push(config);
    this.middlewares.sort((a, b) => a.priority - b.priority);
  }

  list(): string[] {
    return this.middlewares.map((m) => m.name);
  }

  /** Run `handler` inside every registered middleware; resolves with its exit code. */
  async execute(ctx: CliContext, handler: () => Promise<number>): Promise<number> {
    const chain = this.middlewares.map((m) => m.middleware);

    const dispatch = async (index: number): Promise<number> => {
      const middleware = chain[index];
      if (!middleware) {
        return handler();
      }
      return middleware(ctx, () => dispatch(index + 1));
    };

    return dispatch(0);
  }
}
