import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { CLI_ERROR_CODES, createNoOpLogger } from "@qprof/cli-core";
import { inlineQuery } from "../queries";
import { readProfiles } from "../profile-log";
import { ProfilerRunner, type RunEvent } from "../runner";
import { parseTarget } from "../targets";
import { calculateRange } from "../time-range";
import { Workspace } from "../workspace";
import { createFakeSearchClient, type FakeJob } from "./fake-client";

const done = (recordCount = 0, pages?: FakeJob["pages"]): FakeJob => ({
  states: ["GATHERING RESULTS", "DONE GATHERING RESULTS"],
  recordCount,
  pages,
});

describe("ProfilerRunner", () => {
  let root: string;
  let workspace: Workspace;

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), "qprof-runner-"));
    workspace = new Workspace(root);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  const runner = (jobs: FakeJob[], events: RunEvent[] = [], workers = 1) => {
    const client = createFakeSearchClient(jobs);
    return {
      client,
      runner: new ProfilerRunner({
        client,
        workspace,
        queries: [inlineQuery("_index={{deployment}} | count"), inlineQuery("{{org_id}}")],
        range: calculateRange("1h", 1_700_000_000_000),
        format: "csv",
        workers,
        longQueryLimit: 100,
        pause: async () => 0,
        logger: createNoOpLogger(),
        clock: () => new Date("2026-03-01T12:00:00.000Z"),
        onEvent: (event) => events.push(event),
      }),
    };
  };

  it("writes outputs, logs profiles and clears finished placeholders", async () => {
    const page = {
      fields: [{ name: "host", fieldType: "string", keyField: true }],
      records: [{ map: { host: "a,b" } }],
    };
    const { client, runner: run } = runner([done(1, [page]), done()]);

    const summary = await run.run([parseTarget("us2_42")]);

    expect(client.created).toEqual(["_index=us2 | count", "42"]);
    expect(summary.failures).toEqual([]);
    expect(summary.queries).toBe(2);
    expect(summary.profiles.map((p) => [p.queryNumber, p.recordCount, p.iterations])).toEqual([
      [1, 1, 2],
      [2, 0, 2],
    ]);
    expect(readFileSync(path.join(root, "outputs", "sumoquery.us2_42.001.csv"), "utf8")).toBe("host\na|b\n");
    expect(readFileSync(path.join(root, "outputs", "sumoquery.us2_42.002.csv"), "utf8")).toBe("NORECORDS\n");
    expect(await workspace.listPending()).toEqual([]);

    const logged = await readProfiles(workspace.profileLog);
    expect(logged.map((p) => p.startedAt)).toEqual(["2026-03-01T12:00:00.000Z", "2026-03-01T12:00:00.000Z"]);
  });

  it("keeps the placeholder of a failed target and continues with the rest", async () => {
    const events: RunEvent[] = [];
    const cancelled: FakeJob = { states: ["CANCELLED"], recordCount: 0 };
    const { runner: run } = runner([done(), cancelled, done(), done()], events);

    const summary = await run.run([parseTarget("us2_1"), parseTarget("eu_2")]);

    expect(summary.failures).toEqual([
      {
        target: "us2_1",
        queryNumber: 2,
        code: CLI_ERROR_CODES.E_QUERY_FAILED,
        message: "Search job job-2 was cancelled",
      },
    ]);
    expect(summary.profiles.map((p) => p.target)).toEqual(["us2_1", "eu_2", "eu_2"]);
    expect(await workspace.listPending()).toEqual(["us2_1"]);
    expect(existsSync(path.join(root, "outputs", "sumoquery.us2_1.002.csv"))).toBe(false);
    expect(events.map((e) => e.type)).toEqual(["query", "target-failed", "query", "query", "target-done"]);
  });

  it("keeps the placeholder when an earlier run of a repeated target failed", async () => {
    const cancelled: FakeJob = { states: ["CANCELLED"], recordCount: 0 };
    const { runner: run } = runner([cancelled, done(), done()]);

    const summary = await run.run([parseTarget("us2_1"), parseTarget("us2_1")]);

    expect(summary.failures.map((f) => [f.target, f.queryNumber])).toEqual([["us2_1", 1]]);
    expect(summary.profiles).toHaveLength(2);
    expect(await workspace.listPending()).toEqual(["us2_1"]);
  });

  it("restores the placeholder when a later run of a repeated target fails", async () => {
    const cancelled: FakeJob = { states: ["CANCELLED"], recordCount: 0 };
    const { runner: run } = runner([done(), done(), done(), cancelled]);

    const summary = await run.run([parseTarget("us2_1"), parseTarget("us2_1")]);

    expect(summary.failures.map((f) => [f.target, f.queryNumber])).toEqual([["us2_1", 2]]);
    expect(await workspace.listPending()).toEqual(["us2_1"]);
  });
});
