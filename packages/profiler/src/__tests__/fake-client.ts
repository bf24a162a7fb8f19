import type { RecordsPage, SearchJobStatus } from "@qprof/sumo-api";
import type { SearchClient } from "../executor";

export interface FakeJob {
  states: string[];
  recordCount: number;
  messageCount?: number;
  pages?: RecordsPage[];
}

export interface FakeSearchClient extends SearchClient {
  created: string[];
  deleted: string[];
  recordCalls: Array<{ jobId: string; limit: number; offset: number }>;
}

/**
 * In-memory search API. Each created job takes the next script from `jobs`
 * and walks through its states on every status call.
 */
export function createFakeSearchClient(jobs: FakeJob[]): FakeSearchClient {
  const scripts = new Map<string, FakeJob>();
  const created: string[] = [];
  const deleted: string[] = [];
  const recordCalls: FakeSearchClient["recordCalls"] = [];

  const scriptFor = (jobId: string): FakeJob => {
    const script = scripts.get(jobId);
    if (!script) {
      throw new Error(`unknown job ${jobId}`);
    }
    return script;
  };

  return {
    created,
    deleted,
    recordCalls,
    async createSearchJob(query) {
      const script = jobs.shift();
      if (!script) {
        throw new Error("no more scripted jobs");
      }
      const id = `job-${created.length + 1}`;
      created.push(query);
      scripts.set(id, { ...script, states: [...script.states] });
      return { id };
    },
    async getSearchJobStatus(jobId): Promise<SearchJobStatus> {
      const script = scriptFor(jobId);
      const state = script.states.length > 1 ? script.states.shift() : script.states[0];
      return {
        state: state ?? "DONE GATHERING RESULTS",
        recordCount: script.recordCount,
        messageCount: script.messageCount ?? 0,
        pendingErrors: [],
        pendingWarnings: [],
      };
    },
    async getSearchJobRecords(jobId, limit, offset = 0) {
      recordCalls.push({ jobId, limit, offset });
      const page = scriptFor(jobId).pages?.[offset / limit];
      return page ?? { fields: [], records: [] };
    },
    async deleteSearchJob(jobId) {
      deleted.push(jobId);
    },
  };
}
