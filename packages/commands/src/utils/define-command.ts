import type { z } from 'zod';
import {
  CliError,
  CLI_ERROR_CODES,
  type CliContext,
  type FlagDefinition,
  type ResolvedFlags,
} from '@qprof/cli-core';
import type { Command } from '../types';

export interface CommandDefinition<F> {
  name: string;
  describe: string;
  longDescription?: string;
  aliases?: string[];
  examples?: string[];
  /** Argv-level flag metadata: aliases, types, help text. */
  flags: FlagDefinition[];
  /** Validates the resolved flags and applies defaults. */
  schema: z.ZodType<F, z.ZodTypeDef, unknown>;
  handler(ctx: CliContext, argv: string[], flags: F): Promise<number>;
}

/**
 * Build a registry command from a typed definition. Flag values arrive
 * already coerced by `resolveCommandFlags`; the schema turns them into `F`.
 */
export function defineCommand<F>(definition: CommandDefinition<F>): Command {
  const { schema, handler, ...meta } = definition;
  const hidden = new Set(meta.flags.filter((def) => def.sensitive).map((def) => def.name));
  return {
    ...meta,
    async run(ctx, argv, flags) {
      const parsed = schema.safeParse(flags);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => {
            const key = issue.path.join('.');
            return key ? `--${key}: ${issue.message}` : issue.message;
          })
          .join('; ');
        throw new CliError(CLI_ERROR_CODES.E_INVALID_FLAGS, `Invalid flags for ${definition.name}: ${issues}`);
      }
      ctx.logger.debug('Command flags', { command: definition.name, flags: withoutHidden(flags, hidden) });
      return handler(ctx, argv, parsed.data);
    },
  };
}

function withoutHidden(flags: ResolvedFlags, hidden: ReadonlySet<string>): ResolvedFlags {
  return Object.fromEntries(Object.entries(flags).filter(([name]) => !hidden.has(name)));
}
