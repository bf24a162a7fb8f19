import type { Presenter } from "./presenter/types";
import type { Logger } from "./logging";
import type { CliConfig } from "./config";

/** Subset of the runtime formatter registry that commands render through. */
export interface FormatterLookup {
  has(name: string): boolean;
  format(data: unknown, formatName: string): string;
}

export interface CliContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  presenter: Presenter;
  logger: Logger;
  config: CliConfig;
  formatters?: FormatterLookup;
  diagnostics: string[];
  cliVersion: string;
}

export interface CreateContextOptions {
  presenter: Presenter;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  config?: CliConfig;
  formatters?: FormatterLookup;
  cliVersion?: string;
}

export function createContext({
  presenter,
  logger,
  env,
  cwd,
  config = {},
  formatters,
  cliVersion = "0.0.0",
}: CreateContextOptions): CliContext {
  return {
    presenter,
    logger,
    config,
    formatters,
    cwd: cwd ?? process.cwd(),
    env: env ?? process.env,
    diagnostics: [],
    cliVersion,
  };
}
