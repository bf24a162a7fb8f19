import { z } from 'zod';
import { resolveTargets } from '@qprof/query-profiler';
import type { Command } from '../../types';
import { defineCommand } from '../../utils/define-command';
import { profileFlags, ProfileFlagsSchema, resolveProfileSettings } from '../shared/profile-flags';
import { reportRun, runProfiler, type ProfilerDeps } from '../shared/session';

const RunFlagsSchema = ProfileFlagsSchema.extend({
  target: z.array(z.string().min(1)).min(1),
});

export function createRunCommand(deps: ProfilerDeps = {}): Command {
  return defineCommand({
    name: 'run',
    describe: 'Profile queries against one or more targets',
    longDescription:
      'Runs every query against every target as a Sumo Logic search job, writes the records to ' +
      '<outdir>/outputs and appends a timing profile per query to the profile log. ' +
      'Unfinished targets keep a placeholder under <outdir>/pending.',
    flags: [
      {
        name: 'target',
        type: 'array',
        alias: 't',
        description: '<deployment>_<orgid>, or a file listing one per line (repeatable)',
        required: true,
      },
      ...profileFlags,
    ],
    examples: [
      'qprof run -t us2_0000000000ABCDEF',
      'qprof run -t targets.txt -q queries/ -r -1d:1h -w 4',
      'qprof run -t eu_00000000000FEDCB -a aws:ssm:us-east-1:/sumo/profiler --json',
    ],
    schema: RunFlagsSchema,
    async handler(ctx, _argv, flags) {
      const settings = resolveProfileSettings(ctx, flags);
      const targets = await resolveTargets(flags.target, ctx.cwd);
      ctx.logger.info('Resolved targets', { count: targets.length });
      const summary = await runProfiler(ctx, settings, targets, deps);
      return reportRun(ctx, summary);
    },
  });
}

export const run = createRunCommand();
