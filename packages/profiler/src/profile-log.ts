import { z } from "zod";
import { pathKind, readText, type JsonlSink } from "@qprof/cli-adapters";
import { CliError, CLI_ERROR_CODES } from "@qprof/cli-core";

export const QueryProfileSchema = z.object({
  target: z.string(),
  queryNumber: z.number().int().positive(),
  queryLabel: z.string(),
  jobId: z.string(),
  state: z.string(),
  messageCount: z.number().int().nonnegative(),
  recordCount: z.number().int().nonnegative(),
  iterations: z.number().int().nonnegative(),
  pages: z.number().int().nonnegative(),
  createMs: z.number().nonnegative(),
  gatherMs: z.number().nonnegative(),
  fetchMs: z.number().nonnegative(),
  totalMs: z.number().nonnegative(),
  outputFile: z.string(),
  startedAt: z.string(),
});

export type QueryProfile = z.infer<typeof QueryProfileSchema>;

export interface ProfileSummaryRow {
  query: string;
  runs: number;
  records: number;
  minMs: number;
  avgMs: number;
  maxMs: number;
  avgGatherMs: number;
}

export function appendProfile(sink: JsonlSink<QueryProfile>, profile: QueryProfile): Promise<void> {
  return sink.emit(profile);
}

export async function readProfiles(file: string): Promise<QueryProfile[]> {
  if ((await pathKind(file)) !== "file") {
    return [];
  }
  const lines = (await readText(file)).split("\n");
  const profiles: QueryProfile[] = [];
  lines.forEach((line, index) => {
    if (line.trim() === "") {
      return;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      throw malformed(file, index + 1, "not valid JSON");
    }
    const parsed = QueryProfileSchema.safeParse(raw);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      throw malformed(file, index + 1, first ? `${first.path.join(".")}: ${first.message}` : "invalid entry");
    }
    profiles.push(parsed.data);
  });
  return profiles;
}

function malformed(file: string, line: number, reason: string): CliError {
  return new CliError(CLI_ERROR_CODES.E_IO_READ, `Malformed profile log ${file} at line ${line}: ${reason}`, {
    path: file,
    line,
  });
}

/** One row per query label, sorted by label. */
export function summarizeProfiles(profiles: readonly QueryProfile[]): ProfileSummaryRow[] {
  const groups = new Map<string, QueryProfile[]>();
  for (const profile of profiles) {
    const group = groups.get(profile.queryLabel);
    if (group) {
      group.push(profile);
    } else {
      groups.set(profile.queryLabel, [profile]);
    }
  }

  return [...groups.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([query, group]) => {
      const totals = group.map((p) => p.totalMs);
      const sum = (values: number[]) => values.reduce((acc, v) => acc + v, 0);
      return {
        query,
        runs: group.length,
        records: sum(group.map((p) => p.recordCount)),
        minMs: Math.min(...totals),
        avgMs: Math.round(sum(totals) / group.length),
        maxMs: Math.max(...totals),
        avgGatherMs: Math.round(sum(group.map((p) => p.gatherMs)) / group.length),
      };
    });
}
