import { createJsonlSink, type JsonlSink } from "@qprof/cli-adapters";
import { errorMessage, isCliError, type Logger } from "@qprof/cli-core";
import { executeSearch, type SearchClient } from "./executor";
import type { Pause } from "./jitter";
import { assembleOutput, separatorFor, type OutputFormat } from "./output";
import { runPool } from "./pool";
import { appendProfile, type QueryProfile } from "./profile-log";
import { loadQueryText, tailorQuery, type QuerySource } from "./queries";
import type { Target } from "./targets";
import type { TimeRange } from "./time-range";
import { PROFILE_LOG_NAME, type Workspace } from "./workspace";

export interface TargetFailure {
  target: string;
  /** 1-based number of the query that failed, when one had started. */
  queryNumber?: number;
  code?: string;
  message: string;
}

export interface RunSummary {
  targets: string[];
  queries: number;
  profiles: QueryProfile[];
  failures: TargetFailure[];
  elapsedMs: number;
}

export type RunEvent =
  | { type: "query"; profile: QueryProfile }
  | { type: "target-done"; target: string }
  | { type: "target-failed"; failure: TargetFailure };

export interface ProfilerRunnerOptions {
  client: SearchClient;
  workspace: Workspace;
  queries: readonly QuerySource[];
  range: TimeRange;
  format: OutputFormat;
  workers: number;
  longQueryLimit: number;
  pause: Pause;
  logger: Logger;
  pageLimit?: number;
  now?: () => number;
  clock?: () => Date;
  onEvent?: (event: RunEvent) => void;
}

interface TargetOutcome {
  profiles: QueryProfile[];
  failure?: TargetFailure;
}

export class ProfilerRunner {
  private readonly now: () => number;
  private readonly clock: () => Date;
  private readonly failedKeys = new Set<string>();

  constructor(private readonly options: ProfilerRunnerOptions) {
    this.now = options.now ?? (() => performance.now());
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Profile every query against every target. All targets are marked
   * pending up front; a target's placeholder is cleared only once all of
   * its queries have completed. A key listed more than once keeps its
   * placeholder if any of its runs failed.
   */
  async run(targets: readonly Target[]): Promise<RunSummary> {
    const { workspace, workers, logger } = this.options;
    const started = this.now();
    const keys = targets.map((target) => target.key);

    await workspace.prepare();
    await workspace.markPending(keys);
    const sink = createJsonlSink<QueryProfile>(workspace.profileLog, PROFILE_LOG_NAME);
    this.failedKeys.clear();

    logger.info("Profiling run started", {
      targets: keys.length,
      queries: this.options.queries.length,
      workers,
    });

    const results = await runPool(targets, workers, (target) => this.runTarget(target, sink));

    const profiles: QueryProfile[] = [];
    const failures: TargetFailure[] = [];
    results.forEach((result, index) => {
      if (result.ok) {
        profiles.push(...result.value.profiles);
        if (result.value.failure) {
          failures.push(result.value.failure);
        }
      } else {
        failures.push(toFailure(keys[index] ?? "?", result.error));
      }
    });

    // a duplicate may have cleared the placeholder after another run failed
    await workspace.markPending([...new Set(failures.map((failure) => failure.target))]);

    const elapsedMs = Math.round(this.now() - started);
    logger.info("Profiling run finished", { profiles: profiles.length, failures: failures.length, elapsedMs });

    return { targets: keys, queries: this.options.queries.length, profiles, failures, elapsedMs };
  }

  private async runTarget(target: Target, sink: JsonlSink<QueryProfile>): Promise<TargetOutcome> {
    const { queries, pause, workspace, onEvent } = this.options;
    const logger = this.options.logger.child({ category: "runner", meta: { target: target.key } });
    const profiles: QueryProfile[] = [];
    let queryNumber = 0;

    try {
      for (const source of queries) {
        queryNumber++;
        const profile = await this.runQuery(target, source, queryNumber, logger);
        await appendProfile(sink, profile);
        profiles.push(profile);
        onEvent?.({ type: "query", profile });
        await pause();
      }
      await pause();
      if (!this.failedKeys.has(target.key)) {
        await workspace.clearPending(target.key);
      }
    } catch (error) {
      this.failedKeys.add(target.key);
      const failure = toFailure(target.key, error, queryNumber || undefined);
      logger.error("Target failed; placeholder kept", { queryNumber, error: failure.message });
      onEvent?.({ type: "target-failed", failure });
      return { profiles, failure };
    }

    onEvent?.({ type: "target-done", target: target.key });
    return { profiles };
  }

  private async runQuery(
    target: Target,
    source: QuerySource,
    queryNumber: number,
    logger: Logger,
  ): Promise<QueryProfile> {
    const { client, range, format, longQueryLimit, pause, workspace, pageLimit } = this.options;
    const startedAt = this.clock().toISOString();
    const query = tailorQuery(await loadQueryText(source), target, { longQueryLimit });
    logger.debug("Running query", { queryNumber, label: source.label });

    const result = await executeSearch({ client, query, range, pause, logger, pageLimit, now: this.now });
    const outputFile = await workspace.writeOutput(
      target.key,
      queryNumber,
      format,
      assembleOutput(result.pages, separatorFor(format)),
    );

    return {
      target: target.key,
      queryNumber,
      queryLabel: source.label,
      jobId: result.jobId,
      state: result.status.state,
      messageCount: result.status.messageCount,
      recordCount: result.status.recordCount,
      iterations: result.iterations,
      pages: result.pages.length,
      ...result.timings,
      outputFile,
      startedAt,
    };
  }
}

function toFailure(target: string, error: unknown, queryNumber?: number): TargetFailure {
  return {
    target,
    ...(queryNumber !== undefined ? { queryNumber } : {}),
    ...(isCliError(error) ? { code: error.code } : {}),
    message: errorMessage(error),
  };
}
