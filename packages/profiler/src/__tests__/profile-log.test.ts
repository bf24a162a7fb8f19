import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { createJsonlSink } from "@qprof/cli-adapters";
import { CLI_ERROR_CODES } from "@qprof/cli-core";
import { appendProfile, readProfiles, summarizeProfiles, type QueryProfile } from "../profile-log";

function profile(overrides: Partial<QueryProfile>): QueryProfile {
  return {
    target: "us2_1",
    queryNumber: 1,
    queryLabel: "volume.sqy",
    jobId: "J",
    state: "DONE GATHERING RESULTS",
    messageCount: 0,
    recordCount: 10,
    iterations: 2,
    pages: 1,
    createMs: 100,
    gatherMs: 1000,
    fetchMs: 50,
    totalMs: 1150,
    outputFile: "/tmp/out.csv",
    startedAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

describe("profile log", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), "qprof-profiles-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("round-trips appended profiles", async () => {
    const sink = createJsonlSink<QueryProfile>(root, "p.jsonl");
    await appendProfile(sink, profile({ jobId: "A" }));
    await appendProfile(sink, profile({ jobId: "B" }));

    expect((await readProfiles(sink.file)).map((p) => p.jobId)).toEqual(["A", "B"]);
  });

  it("returns nothing for a missing log", async () => {
    expect(await readProfiles(path.join(root, "none.jsonl"))).toEqual([]);
  });

  it("names the malformed line", async () => {
    const file = path.join(root, "p.jsonl");
    writeFileSync(file, `${JSON.stringify(profile({}))}\n{oops\n`);

    await expect(readProfiles(file)).rejects.toMatchObject({
      code: CLI_ERROR_CODES.E_IO_READ,
      message: `Malformed profile log ${file} at line 2: not valid JSON`,
    });
  });

  it("summarizes per query label, sorted", () => {
    const rows = summarizeProfiles([
      profile({ queryLabel: "z.sqy", totalMs: 100, gatherMs: 10, recordCount: 1 }),
      profile({ queryLabel: "a.sqy", totalMs: 300, gatherMs: 200, recordCount: 5 }),
      profile({ queryLabel: "a.sqy", totalMs: 100, gatherMs: 100, recordCount: 7 }),
    ]);

    expect(rows).toEqual([
      { query: "a.sqy", runs: 2, records: 12, minMs: 100, avgMs: 200, maxMs: 300, avgGatherMs: 150 },
      { query: "z.sqy", runs: 1, records: 1, minMs: 100, avgMs: 100, maxMs: 100, avgGatherMs: 10 },
    ]);
  });
});
