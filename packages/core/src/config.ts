import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { CliError, CLI_ERROR_CODES, errorMessage } from "./errors";

export const CONFIG_FILE_NAME = "qprof.config.json";

export const CliConfigSchema = z
  .object({
    outputDir: z.string().min(1).optional(),
    range: z.string().min(1).optional(),
    format: z.enum(["csv", "txt"]).optional(),
    sleep: z.number().int().min(0).optional(),
    workers: z.number().int().min(1).optional(),
    endpoint: z.string().min(1).optional(),
    longQueryLimit: z.number().int().positive().optional(),
  })
  .strict();

export type CliConfig = z.infer<typeof CliConfigSchema>;

export interface LoadedConfig {
  config: CliConfig;
  path?: string;
}

/** Walk up from `start` looking for `fileName`; stops at the filesystem root. */
export function findNearestConfig(
  start: string,
  fileName: string = CONFIG_FILE_NAME,
): string | undefined {
  let cur = path.resolve(start);
  while (true) {
    const candidate = path.join(cur, fileName);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = path.dirname(cur);
    if (parent === cur) {
      return undefined;
    }
    cur = parent;
  }
}

export function loadConfig(options: { cwd: string; explicitPath?: string }): LoadedConfig {
  const file = options.explicitPath
    ? path.resolve(options.cwd, options.explicitPath)
    : findNearestConfig(options.cwd);

  if (!file) {
    return { config: {} };
  }
  if (!existsSync(file)) {
    throw new CliError(CLI_ERROR_CODES.E_CONFIG, `Config file not found: ${file}`, { file });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf8"));
  } catch (error) {
    throw new CliError(
      CLI_ERROR_CODES.E_CONFIG,
      `Config file ${file} is not valid JSON: ${errorMessage(error)}`,
      { file },
    );
  }

  const parsed = CliConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    throw new CliError(
      CLI_ERROR_CODES.E_CONFIG,
      `Invalid config ${file}: ${issues.join("; ")}`,
      { file, issues },
    );
  }
  return { config: parsed.data, path: file };
}
