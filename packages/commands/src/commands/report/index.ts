import { z } from 'zod';
import { CliError, CLI_ERROR_CODES } from '@qprof/cli-core';
import { readProfiles, summarizeProfiles, Workspace } from '@qprof/query-profiler';
import type { Command } from '../../types';
import { defineCommand } from '../../utils/define-command';
import { outdirFlag, resolveOutputDir } from '../shared/profile-flags';

export const REPORT_FORMATS = ['table', 'json', 'yaml', 'markdown'] as const;

const ReportFlagsSchema = z.object({
  outdir: z.string().min(1).optional(),
  format: z.enum(REPORT_FORMATS).default('table'),
  target: z.array(z.string().min(1)).optional(),
});

export const report: Command = defineCommand({
  name: 'report',
  describe: 'Summarise the profile log of an output directory',
  longDescription: 'Groups recorded query profiles by query and shows runs, records and min/avg/max durations.',
  flags: [
    outdirFlag,
    {
      name: 'format',
      type: 'string',
      alias: 'o',
      description: 'Report format',
      default: 'table',
      choices: [...REPORT_FORMATS],
    },
    {
      name: 'target',
      type: 'array',
      alias: 't',
      description: 'Only include these targets',
    },
  ],
  examples: ['qprof report', 'qprof report -d ./profiles -o markdown', 'qprof report -t us2_0000000000ABCDEF --json'],
  schema: ReportFlagsSchema,
  async handler(ctx, _argv, flags) {
    const workspace = new Workspace(resolveOutputDir(ctx, flags.outdir));
    const log = workspace.profileLog;
    const only = flags.target ? new Set(flags.target) : undefined;
    const profiles = (await readProfiles(log)).filter((p) => !only || only.has(p.target));
    const rows = summarizeProfiles(profiles);

    if (ctx.presenter.isJSON) {
      ctx.presenter.json({ ok: true, log, rows });
      return 0;
    }
    if (rows.length === 0) {
      ctx.presenter.info(`No profiles recorded in ${log}`);
      return 0;
    }
    if (!ctx.formatters) {
      throw new CliError(CLI_ERROR_CODES.E_CONFIG, 'No output formatters are registered');
    }
    ctx.presenter.write(ctx.formatters.format(rows, flags.format));
    return 0;
  },
});
