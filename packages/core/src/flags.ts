import { CliError, CLI_ERROR_CODES } from "./errors";

export type LogLevelName = "trace" | "debug" | "info" | "warn" | "error" | "silent";

export type GlobalFlags = {
  json?: boolean;
  logLevel?: string;
  config?: string;
  noColor?: boolean;
  verbose?: boolean;
  debug?: boolean;
  help?: boolean;
  version?: boolean;
  quiet?: boolean;
};

export type RawFlagValue = string | boolean | Array<string | boolean>;
export type RawFlags = Record<string, RawFlagValue>;

export type FlagValue = string | number | boolean | string[];
export type ResolvedFlags = Record<string, FlagValue>;

export interface FlagDefinition {
  name: string;                    // "target", "long-query-limit"
  type: "boolean" | "string" | "number" | "array";
  alias?: string;                  // single letter: "t"
  description?: string;
  default?: FlagValue;             // shown in help; zod schemas apply the actual default
  required?: boolean;
  choices?: string[];
  sensitive?: boolean;             // never written to logs
}

export interface ParsedArgs {
  cmdPath: string[];
  rest: string[];
  global: GlobalFlags;
  flagsObj: RawFlags;
}

function addFlag(flags: RawFlags, key: string, value: string | boolean): void {
  const existing = flags[key];
  if (existing === undefined) {
    flags[key] = value;
  } else if (Array.isArray(existing)) {
    existing.push(value);
  } else {
    flags[key] = [existing, value];
  }
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = [...argv];
  const global: GlobalFlags = {};
  const flagsObj: RawFlags = {};
  const cmdPath: string[] = [];

  const takeValue = (): string | undefined => {
    const maybe = args[0];
    // "-1h" style values are relative offsets, not flags
    if (maybe === undefined || (maybe.startsWith("-") && !/^-\d/.test(maybe))) {
      return undefined;
    }
    args.shift();
    return maybe;
  };

  while (args.length) {
    const a = args.shift();
    if (a === undefined) {
      break;
    }
    if (a === "--") {
      break;
    }
    if (!a.startsWith("-") || a === "-") {
      cmdPath.push(a);
      continue;
    }

    switch (a) {
      case "--json":
        global.json = true;
        break;
      case "-h":
      case "--help":
        global.help = true;
        break;
      case "--version":
        global.version = true;
        break;
      case "--no-color":
        global.noColor = true;
        break;
      case "--quiet":
        global.quiet = true;
        break;
      case "--debug":
        global.debug = true;
        global.logLevel = "debug";
        break;
      case "--verbose":
        global.verbose = true;
        global.logLevel = "debug";
        break;
      case "--log-level":
        global.logLevel = takeValue();
        break;
      case "--config":
        global.config = takeValue();
        break;
      default: {
        // Support --flag=value, --flag value, --flag, -f value and -f
        const stripped = a.replace(/^--?/, "");
        const eq = stripped.indexOf("=");
        if (eq > 0) {
          addFlag(flagsObj, stripped.slice(0, eq), stripped.slice(eq + 1));
        } else {
          addFlag(flagsObj, stripped, takeValue() ?? true);
        }
      }
    }
  }

  return { cmdPath, rest: args, global, flagsObj };
}

function invalid(message: string): CliError {
  return new CliError(CLI_ERROR_CODES.E_INVALID_FLAGS, message);
}

function lastOf(value: RawFlagValue): string | boolean {
  if (!Array.isArray(value)) {
    return value;
  }
  const last = value[value.length - 1];
  return last === undefined ? true : last;
}

function coerce(def: FlagDefinition, raw: RawFlagValue): FlagValue {
  switch (def.type) {
    case "boolean": {
      const value = lastOf(raw);
      if (typeof value === "boolean") return value;
      const normalized = value.trim().toLowerCase();
      if (normalized === "true" || normalized === "") return true;
      if (normalized === "false") return false;
      throw invalid(`Flag --${def.name} must be a boolean`);
    }
    case "number": {
      const value = lastOf(raw);
      const n = typeof value === "string" ? Number(value) : Number.NaN;
      if (typeof value !== "string" || value.trim() === "" || !Number.isFinite(n)) {
        throw invalid(`Flag --${def.name} expects a number`);
      }
      return n;
    }
    case "array": {
      const values = Array.isArray(raw) ? raw : [raw];
      return values.map((v) => {
        if (typeof v !== "string") {
          throw invalid(`Flag --${def.name} expects a value`);
        }
        return v;
      });
    }
    default: {
      const value = lastOf(raw);
      if (typeof value !== "string") {
        throw invalid(`Flag --${def.name} expects a value`);
      }
      return value;
    }
  }
}

/**
 * Map aliases onto flag names, coerce raw argv values to the declared types
 * and check choices/required.
 */
export function resolveCommandFlags(
  flags: RawFlags,
  schema: FlagDefinition[]
): ResolvedFlags {
  const byKey = new Map<string, FlagDefinition>();
  for (const def of schema) {
    byKey.set(def.name, def);
    if (def.alias) {
      byKey.set(def.alias, def);
    }
  }

  const merged = new Map<FlagDefinition, RawFlagValue>();
  for (const [key, value] of Object.entries(flags)) {
    const def = byKey.get(key);
    if (!def) {
      throw invalid(`Unknown flag ${key.length === 1 ? "-" : "--"}${key}`);
    }
    const previous = merged.get(def);
    if (previous === undefined) {
      merged.set(def, value);
    } else {
      merged.set(def, [
        ...(Array.isArray(previous) ? previous : [previous]),
        ...(Array.isArray(value) ? value : [value]),
      ]);
    }
  }

  const resolved: ResolvedFlags = {};
  for (const def of schema) {
    const raw = merged.get(def);
    if (raw === undefined) {
      if (def.required) {
        throw invalid(`Missing required flag --${def.name}`);
      }
      continue;
    }
    const value = coerce(def, raw);
    if (def.choices && !def.choices.includes(String(value))) {
      throw invalid(
        `Invalid value for --${def.name}: ${String(value)}. Must be one of: ${def.choices.join(", ")}`
      );
    }
    resolved[def.name] = value;
  }
  return resolved;
}
