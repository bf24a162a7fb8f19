import {
  createContext,
  createNoOpLogger,
  failureLine,
  failurePayload,
  parseArgs,
  resolveCommandFlags,
  type CliConfig,
  type CliContext,
  type FormatterLookup,
  type Presenter,
} from '@qprof/cli-core';
import type { SearchClient } from '@qprof/query-profiler';
import type { Command } from '../types';

export interface CapturingPresenter extends Presenter {
  out: string[];
  warnings: string[];
  errors: string[];
  payloads: unknown[];
}

export function createCapturingPresenter(isJSON = false): CapturingPresenter {
  const out: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];
  const payloads: unknown[] = [];
  return {
    isTTY: false,
    isQuiet: false,
    isJSON,
    out,
    warnings,
    errors,
    payloads,
    write: (line) => out.push(line),
    info: (line) => out.push(line),
    warn: (line) => warnings.push(line),
    error: (line) => errors.push(line),
    fail: (error, warnings) =>
      isJSON ? payloads.push(failurePayload(error, warnings)) : errors.push(failureLine(error)),
    json: (payload) => payloads.push(payload),
  };
}

export interface TestContextOptions {
  cwd: string;
  json?: boolean;
  config?: CliConfig;
  env?: NodeJS.ProcessEnv;
  formatters?: FormatterLookup;
}

export function createTestContext(options: TestContextOptions): { ctx: CliContext; presenter: CapturingPresenter } {
  const presenter = createCapturingPresenter(options.json ?? false);
  const ctx = createContext({
    presenter,
    logger: createNoOpLogger(),
    cwd: options.cwd,
    env: options.env ?? {},
    config: options.config ?? {},
    formatters: options.formatters,
    cliVersion: '1.4.0',
  });
  return { ctx, presenter };
}

/** Parse argv the way the bin does and run the command. */
export function invoke(cmd: Command, ctx: CliContext, argv: string[]): Promise<number> {
  const { flagsObj, rest } = parseArgs(argv);
  return cmd.run(ctx, rest, resolveCommandFlags(flagsObj, cmd.flags ?? []));
}

export interface StubSearchClient extends SearchClient {
  created: string[];
  deleted: string[];
}

/**
 * Every job finishes at once with no records; queries containing
 * `cancelMarker` come back CANCELLED.
 */
export function createStubSearchClient(cancelMarker?: string): StubSearchClient {
  const created: string[] = [];
  const deleted: string[] = [];
  const queries = new Map<string, string>();
  return {
    created,
    deleted,
    async createSearchJob(query) {
      created.push(query);
      const id = `job-${created.length}`;
      queries.set(id, query);
      return { id };
    },
    async getSearchJobStatus(jobId) {
      const query = queries.get(jobId) ?? '';
      const cancelled = cancelMarker !== undefined && query.includes(cancelMarker);
      return {
        state: cancelled ? 'CANCELLED' : 'DONE GATHERING RESULTS',
        messageCount: 0,
        recordCount: 0,
        pendingErrors: [],
        pendingWarnings: [],
      };
    },
    async getSearchJobRecords() {
      return { fields: [], records: [] };
    },
    async deleteSearchJob(jobId) {
      deleted.push(jobId);
    },
  };
}
