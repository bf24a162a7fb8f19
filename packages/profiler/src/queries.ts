import path from "node:path";
import { glob } from "glob";
import { pathKind, readText } from "@qprof/cli-adapters";
import type { Target } from "./targets";

export const DEFAULT_QUERY = "_index=sumologic_volume\n| count by _sourceCategory";
export const QUERY_EXTENSION = ".sqy";
export const DEFAULT_LONG_QUERY_LIMIT = 100;

export type QuerySource =
  | { kind: "inline"; label: string; text: string }
  | { kind: "file"; label: string; path: string };

const INLINE_LABEL_MAX = 60;

function inlineLabel(text: string): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > INLINE_LABEL_MAX ? `${flat.slice(0, INLINE_LABEL_MAX - 1)}…` : flat;
}

export function inlineQuery(text: string): QuerySource {
  return { kind: "inline", label: inlineLabel(text), text };
}

/**
 * Queries to run, in order. A file is one query; a directory contributes
 * every `.sqy` file below it, sorted by path; any other value is the query.
 */
export async function collectQueries(input?: string, cwd: string = process.cwd()): Promise<QuerySource[]> {
  if (input === undefined || input.trim() === "") {
    return [inlineQuery(DEFAULT_QUERY)];
  }

  const resolved = path.resolve(cwd, input);
  const kind = await pathKind(resolved);

  if (kind === "file") {
    return [{ kind: "file", label: path.basename(resolved), path: resolved }];
  }

  if (kind === "directory") {
    const files = await glob(`**/*${QUERY_EXTENSION}`, { cwd: resolved, nodir: true, posix: true });
    return files.sort().map((file) => ({
      kind: "file",
      label: file,
      path: path.join(resolved, file),
    }));
  }

  return [inlineQuery(input)];
}

export async function loadQueryText(source: QuerySource): Promise<string> {
  return source.kind === "file" ? readText(source.path) : source.text;
}

export interface TailorOptions {
  longQueryLimit?: number;
}

/** Fill in the per-target placeholders of a query template. */
export function tailorQuery(text: string, target: Target, options: TailorOptions = {}): string {
  const replacements: Record<string, string> = {
    "{{deployment}}": target.deployment,
    "{{org_id}}": target.orgId,
    "{{longquery_limit_stmt}}": String(options.longQueryLimit ?? DEFAULT_LONG_QUERY_LIMIT),
    "{{key}}": target.key,
  };
  let query = text;
  for (const [placeholder, value] of Object.entries(replacements)) {
    query = query.split(placeholder).join(value);
  }
  return query;
}
