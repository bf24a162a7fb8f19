import type { CliContext } from "@qprof/cli-core";

import {
  MiddlewareManager,
  type MiddlewareConfig,
} from "./middleware/middleware-manager";
import {
  FormattersRegistry,
  type OutputFormatter,
} from "./formatters/formatters-registry";
import {
  createRuntimeContext,
  type RuntimeContextOptions,
} from "./context/runtime-context";
import { jsonFormatter } from "./formatters/builtin/json";
import { yamlFormatter } from "./formatters/builtin/yaml";
import { tableFormatter } from "./formatters/builtin/table";
import { markdownFormatter } from "./formatters/builtin/markdown";

const BUILTIN_FORMATTERS: readonly OutputFormatter[] = [
  jsonFormatter,
  yamlFormatter,
  tableFormatter,
  markdownFormatter,
];

export interface RuntimeSetupOptions extends RuntimeContextOptions {
  middlewares?: MiddlewareConfig[];
  /** Registered after the builtins; a formatter with a builtin's name replaces it. */
  formatters?: OutputFormatter[];
}

export interface CliRuntime {
  context: CliContext;
  middleware: MiddlewareManager;
  formatters: FormattersRegistry;
  /** Run a command handler with the runtime context through the middleware chain. */
  execute(handler: (ctx: CliContext) => Promise<number>): Promise<number>;
}

export function createCliRuntime(options: RuntimeSetupOptions): CliRuntime {
  const { middlewares, formatters, ...contextOptions } = options;

  const middleware = new MiddlewareManager();
  for (const config of middlewares ?? []) {
    middleware.register(config);
  }

  const registry = new FormattersRegistry();
  for (const formatter of [...BUILTIN_FORMATTERS, ...(formatters ?? [])]) {
    registry.register(formatter);
  }

  const context = createRuntimeContext(contextOptions, registry);

  return {
    context,
    middleware,
    formatters: registry,
    execute: (handler) => middleware.execute(context, () => handler(context)),
  };
}
