import { createContext, type CliContext, type CreateContextOptions } from "@qprof/cli-core";
import type { FormattersRegistry } from "../formatters/formatters-registry";

export type RuntimeContextOptions = Omit<CreateContextOptions, "formatters">;

/** Context whose `formatters` is the runtime's registry. */
export function createRuntimeContext(
  options: RuntimeContextOptions,
  formatters: FormattersRegistry,
): CliContext {
  return createContext({ ...options, formatters });
}
