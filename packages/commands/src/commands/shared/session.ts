import type { SsmParameterFetcher } from '@qprof/cli-adapters';
import {
  box,
  colors,
  formatTiming,
  keyValue,
  type CliContext,
} from '@qprof/cli-core';
import {
  calculateRange,
  collectQueries,
  createJitter,
  ProfilerRunner,
  resolveCredentials,
  Workspace,
  type RunEvent,
  type RunSummary,
  type SearchClient,
  type Target,
} from '@qprof/query-profiler';
import { SumoApiClient, type SumoApiClientOptions } from '@qprof/sumo-api';
import type { ProfileSettings } from './profile-flags';

/** Seams the profiling commands reach the outside world through. */
export interface ProfilerDeps {
  createClient?: (options: SumoApiClientOptions) => Promise<SearchClient>;
  fetchParameter?: SsmParameterFetcher;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => number;
}

const defaultCreateClient = (options: SumoApiClientOptions): Promise<SearchClient> =>
  SumoApiClient.create(options);

export async function runProfiler(
  ctx: CliContext,
  settings: ProfileSettings,
  targets: readonly Target[],
  deps: ProfilerDeps = {},
): Promise<RunSummary> {
  const credentials = await resolveCredentials({
    apiKey: settings.apiKey,
    env: ctx.env,
    fetchParameter: deps.fetchParameter,
  });
  const createClient = deps.createClient ?? defaultCreateClient;
  const client = await createClient({
    ...credentials,
    endpoint: settings.endpoint,
    sleep: deps.sleep,
    logger: ctx.logger.child({ category: 'sumo-api' }),
  });

  const workspace = new Workspace(settings.outputDir);
  const queries = await collectQueries(settings.queryInput, ctx.cwd);
  const range = calculateRange(settings.range, deps.now?.());
  const pause = createJitter({ maxSeconds: settings.sleep, random: deps.random, sleep: deps.sleep });

  if (!ctx.presenter.isJSON) {
    ctx.presenter.info(
      box(
        'Query Profiler',
        keyValue({
          Targets: targets.length,
          Queries: queries.length,
          From: new Date(range.from).toISOString(),
          To: new Date(range.to).toISOString(),
          Output: workspace.root,
          Workers: settings.workers,
        }),
      ),
    );
  }

  const runner = new ProfilerRunner({
    client,
    workspace,
    queries,
    range,
    format: settings.format,
    workers: settings.workers,
    longQueryLimit: settings.longQueryLimit,
    pause,
    logger: ctx.logger.child({ category: 'profiler' }),
    onEvent: ctx.presenter.isJSON ? undefined : (event) => renderEvent(ctx, event),
  });
  return runner.run(targets);
}

function renderEvent(ctx: CliContext, event: RunEvent): void {
  switch (event.type) {
    case 'query': {
      const { profile } = event;
      ctx.presenter.info(
        `  ${colors.green('✓')} ${profile.target} #${profile.queryNumber} ${colors.dim(profile.queryLabel)}` +
          `  ${profile.recordCount} records in ${formatTiming(profile.totalMs)}`,
      );
      break;
    }
    case 'target-done':
      ctx.presenter.info(`  ${colors.green('●')} ${event.target} complete`);
      break;
    case 'target-failed':
      ctx.presenter.warn(`  ${colors.red('✗')} ${event.failure.target}: ${event.failure.message}`);
      break;
  }
}

/** Summary box, or `{ ok, summary }` in JSON mode. Exit 1 when any target failed. */
export function reportRun(ctx: CliContext, summary: RunSummary): number {
  const ok = summary.failures.length === 0;
  if (ctx.presenter.isJSON) {
    ctx.presenter.json({ ok, summary });
    return ok ? 0 : 1;
  }

  ctx.presenter.info(
    box(
      'Summary',
      keyValue({
        Targets: summary.targets.length,
        Queries: summary.queries,
        Profiles: summary.profiles.length,
        Failures: summary.failures.length,
        Elapsed: formatTiming(summary.elapsedMs),
      }),
    ),
  );
  for (const failure of summary.failures) {
    const where = failure.queryNumber === undefined ? '' : ` (query #${failure.queryNumber})`;
    ctx.presenter.error(`${failure.target}${where}: ${failure.message}`);
  }
  if (!ok) {
    ctx.presenter.info(colors.dim("Failed targets keep their placeholders; run 'qprof resume' to retry them."));
  }
  return ok ? 0 : 1;
}
