import path from 'node:path';
import { z } from 'zod';
import { envString } from '@qprof/cli-adapters';
import type { CliContext, FlagDefinition } from '@qprof/cli-core';
import {
  DEFAULT_LONG_QUERY_LIMIT,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_RANGE,
  OUTPUT_FORMATS,
  type OutputFormat,
} from '@qprof/query-profiler';

export const DEFAULT_SLEEP_SECONDS = 3;
export const DEFAULT_WORKERS = 1;

export const outdirFlag: FlagDefinition = {
  name: 'outdir',
  type: 'string',
  alias: 'd',
  description: 'Directory for outputs, placeholders and the profile log',
  default: DEFAULT_OUTPUT_DIR,
};

export const rangeFlag: FlagDefinition = {
  name: 'range',
  type: 'string',
  alias: 'r',
  description: 'Time span ending now (1h) or offset:span (-1d:2h)',
  default: DEFAULT_RANGE,
};

/** Flags shared by `run` and `resume`. */
export const profileFlags: FlagDefinition[] = [
  {
    name: 'apikey',
    type: 'string',
    alias: 'a',
    description: '<accessId>:<accessKey> or aws:ssm:<region>:<parameter>',
    sensitive: true,
  },
  {
    name: 'query',
    type: 'string',
    alias: 'q',
    description: 'Query text, a query file or a directory of .sqy files',
  },
  rangeFlag,
  {
    name: 'format',
    type: 'string',
    alias: 'o',
    description: 'Output file format',
    default: 'csv',
    choices: [...OUTPUT_FORMATS],
  },
  outdirFlag,
  {
    name: 'sleep',
    type: 'number',
    alias: 's',
    description: 'Upper bound in seconds of the random pause between API calls',
    default: DEFAULT_SLEEP_SECONDS,
  },
  {
    name: 'workers',
    type: 'number',
    alias: 'w',
    description: 'Targets profiled concurrently',
    default: DEFAULT_WORKERS,
  },
  {
    name: 'endpoint',
    type: 'string',
    alias: 'e',
    description: 'Deployment code (us2, eu) or API URL; discovered when omitted',
  },
  {
    name: 'long-query-limit',
    type: 'number',
    description: 'Value substituted for {{longquery_limit_stmt}}',
    default: DEFAULT_LONG_QUERY_LIMIT,
  },
];

export const ProfileFlagsSchema = z.object({
  apikey: z.string().min(1).optional(),
  query: z.string().min(1).optional(),
  range: z.string().min(1).optional(),
  format: z.enum(OUTPUT_FORMATS).optional(),
  outdir: z.string().min(1).optional(),
  sleep: z.number().int().min(0).optional(),
  workers: z.number().int().min(1).optional(),
  endpoint: z.string().min(1).optional(),
  'long-query-limit': z.number().int().positive().optional(),
});

export type ProfileFlags = z.infer<typeof ProfileFlagsSchema>;

export interface ProfileSettings {
  apiKey?: string;
  queryInput?: string;
  range: string;
  format: OutputFormat;
  outputDir: string;
  sleep: number;
  workers: number;
  endpoint?: string;
  longQueryLimit: number;
}

export function resolveOutputDir(ctx: CliContext, outdir: string | undefined): string {
  return path.resolve(ctx.cwd, outdir ?? ctx.config.outputDir ?? DEFAULT_OUTPUT_DIR);
}

/** Flag, then config file, then built-in default. SUMO_ENDPOINT sits below the config file. */
export function resolveProfileSettings(ctx: CliContext, flags: ProfileFlags): ProfileSettings {
  const { config } = ctx;
  return {
    apiKey: flags.apikey,
    queryInput: flags.query,
    range: flags.range ?? config.range ?? DEFAULT_RANGE,
    format: flags.format ?? config.format ?? 'csv',
    outputDir: resolveOutputDir(ctx, flags.outdir),
    sleep: flags.sleep ?? config.sleep ?? DEFAULT_SLEEP_SECONDS,
    workers: flags.workers ?? config.workers ?? DEFAULT_WORKERS,
    endpoint: flags.endpoint ?? config.endpoint ?? envString(ctx.env, 'SUMO_ENDPOINT'),
    longQueryLimit: flags['long-query-limit'] ?? config.longQueryLimit ?? DEFAULT_LONG_QUERY_LIMIT,
  };
}
