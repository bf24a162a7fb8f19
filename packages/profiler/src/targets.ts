import path from "node:path";
import { pathKind, readText } from "@qprof/cli-adapters";
import { CliError, CLI_ERROR_CODES } from "@qprof/cli-core";

export interface Target {
  key: string;
  deployment: string;
  orgId: string;
}

/** `<deployment>_<orgid>`; anything after a second `_` is ignored. */
export function parseTarget(key: string): Target {
  const [deployment = "", orgId = ""] = key.split("_");
  if (!deployment || !orgId) {
    throw new CliError(
      CLI_ERROR_CODES.E_INVALID_TARGET,
      `Invalid target "${key}". Expected <deployment>_<orgid>`,
      { target: key },
    );
  }
  return { key, deployment, orgId };
}

export function parseTargetList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .filter((line) => line.trim() !== "" && !line.trimStart().startsWith("#"));
}

/**
 * Expand target arguments: a value naming an existing file contributes one
 * target per line, anything else is a target key. Files resolve against `cwd`.
 */
export async function resolveTargets(values: readonly string[], cwd: string = process.cwd()): Promise<Target[]> {
  const keys: string[] = [];
  for (const value of values) {
    const file = path.resolve(cwd, value);
    if ((await pathKind(file)) === "file") {
      keys.push(...parseTargetList(await readText(file)));
    } else {
      keys.push(value);
    }
  }
  return keys.map(parseTarget);
}
