import { CliError, CLI_ERROR_CODES, errorMessage, type Logger } from "@qprof/cli-core";
import type { RecordsPage, SearchJobStatus, SumoApiClient } from "@qprof/sumo-api";
import type { Pause } from "./jitter";
import type { TimeRange } from "./time-range";

export const DEFAULT_PAGE_LIMIT = 10_000;

const RUNNING_STATES: ReadonlySet<string> = new Set(["NOT STARTED", "GATHERING RESULTS"]);

export type SearchClient = Pick<
  SumoApiClient,
  "createSearchJob" | "getSearchJobStatus" | "getSearchJobRecords" | "deleteSearchJob"
>;

export interface SearchTimings {
  createMs: number;
  gatherMs: number;
  fetchMs: number;
  totalMs: number;
}

export interface SearchResult {
  jobId: string;
  status: SearchJobStatus;
  iterations: number;
  pages: RecordsPage[];
  timings: SearchTimings;
}

export interface ExecuteSearchOptions {
  client: SearchClient;
  query: string;
  range: TimeRange;
  pageLimit?: number;
  pause: Pause;
  logger: Logger;
  now?: () => number;
}

/**
 * Run one query as a search job: create, poll until it settles, page
 * through the records, delete the job.
 */
export async function executeSearch(options: ExecuteSearchOptions): Promise<SearchResult> {
  const { client, query, range, pause, logger } = options;
  const pageLimit = options.pageLimit ?? DEFAULT_PAGE_LIMIT;
  const now = options.now ?? (() => performance.now());

  const started = now();
  const job = await client.createSearchJob(query, range);
  const created = now();
  logger.debug("Search job created", { jobId: job.id });

  try {
    let status = await client.getSearchJobStatus(job.id);
    let iterations = 1;
    await pause();
    while (RUNNING_STATES.has(status.state)) {
      status = await client.getSearchJobStatus(job.id);
      iterations++;
      await pause();
    }
    const gathered = now();

    if (status.state === "CANCELLED") {
      throw new CliError(CLI_ERROR_CODES.E_QUERY_FAILED, `Search job ${job.id} was cancelled`, {
        jobId: job.id,
        pendingErrors: status.pendingErrors,
      });
    }
    if (status.state === "FORCE PAUSED") {
      logger.warn("Search job was force paused; results are partial", { jobId: job.id });
    }
    for (const warning of status.pendingWarnings) {
      logger.warn("Search job warning", { jobId: job.id, warning });
    }

    const pages: RecordsPage[] = [];
    const pageCount = status.recordCount > 0 ? Math.ceil(status.recordCount / pageLimit) : 0;
    for (let page = 0; page < pageCount; page++) {
      pages.push(await client.getSearchJobRecords(job.id, pageLimit, page * pageLimit));
    }
    const fetched = now();

    logger.debug("Search job finished", {
      jobId: job.id,
      state: status.state,
      records: status.recordCount,
      messages: status.messageCount,
      iterations,
    });

    return {
      jobId: job.id,
      status,
      iterations,
      pages,
      timings: {
        createMs: Math.round(created - started),
        gatherMs: Math.round(gathered - created),
        fetchMs: Math.round(fetched - gathered),
        totalMs: Math.round(fetched - started),
      },
    };
  } finally {
    await deleteQuietly(client, job.id, logger);
  }
}

async function deleteQuietly(client: SearchClient, jobId: string, logger: Logger): Promise<void> {
  try {
    await client.deleteSearchJob(jobId);
  } catch (error) {
    logger.warn("Failed to delete search job", { jobId, error: errorMessage(error) });
  }
}
