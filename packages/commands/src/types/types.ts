import type { CliContext, FlagDefinition, ResolvedFlags } from '@qprof/cli-core';

/** Resolves with the process exit code. */
export type CommandRun = (
  ctx: CliContext,
  argv: string[],
  flags: ResolvedFlags,
) => Promise<number>;

export interface Command {
  name: string;                    // "run", "report"
  describe: string;                // one-line summary
  longDescription?: string;        // shown in command help
  aliases?: string[];
  flags?: FlagDefinition[];
  examples?: string[];
  run: CommandRun;
}

export interface CommandLookup {
  get(name: string): Command | undefined;
  list(): Command[];
}
