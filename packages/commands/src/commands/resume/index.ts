import { parseTarget, Workspace } from '@qprof/query-profiler';
import type { Command } from '../../types';
import { defineCommand } from '../../utils/define-command';
import { profileFlags, ProfileFlagsSchema, resolveProfileSettings } from '../shared/profile-flags';
import { reportRun, runProfiler, type ProfilerDeps } from '../shared/session';

export function createResumeCommand(deps: ProfilerDeps = {}): Command {
  return defineCommand({
    name: 'resume',
    describe: 'Re-run the targets left pending by an interrupted run',
    longDescription:
      'Reads the placeholders under <outdir>/pending and profiles those targets again with the given queries.',
    flags: profileFlags,
    examples: ['qprof resume', 'qprof resume -d ./profiles -q queries/'],
    schema: ProfileFlagsSchema,
    async handler(ctx, _argv, flags) {
      const settings = resolveProfileSettings(ctx, flags);
      const workspace = new Workspace(settings.outputDir);
      const pending = await workspace.listPending();

      if (pending.length === 0) {
        if (ctx.presenter.isJSON) {
          ctx.presenter.json({ ok: true, pending: [] });
        } else {
          ctx.presenter.info(`No pending targets in ${workspace.pendingDir}`);
        }
        return 0;
      }

      ctx.logger.info('Resuming pending targets', { count: pending.length });
      const summary = await runProfiler(ctx, settings, pending.map(parseTarget), deps);
      return reportRun(ctx, summary);
    },
  });
}

export const resume = createResumeCommand();
