import { colors } from "@qprof/cli-core";
import type { Command } from "../types";

const GLOBAL_OPTIONS: Array<{ name: string; desc: string }> = [
  { name: "--help, -h", desc: "Show help information" },
  { name: "--version", desc: "Show CLI version" },
  { name: "--json", desc: "Output in JSON format" },
  { name: "--quiet", desc: "Suppress detailed output" },
  { name: "--config <file>", desc: "Use this config file instead of qprof.config.json" },
  { name: "--log-level <l>", desc: "trace, debug, info, warn, error or silent" },
  { name: "--debug", desc: "Shorthand for --log-level debug" },
  { name: "--no-color", desc: "Disable ANSI colors" },
];

export function renderGlobalHelp(commands: Command[]): string {
  const lines: string[] = [];

  lines.push(colors.cyan(colors.bold("qprof")) + " - Sumo Logic query profiler");
  lines.push("");
  lines.push(colors.bold("Usage:") + " qprof <command> [options]");
  lines.push("");

  if (commands.length > 0) {
    lines.push(colors.bold("Commands:"));
    lines.push("");
    const width = Math.max(12, ...commands.map((cmd) => cmd.name.length));
    for (const cmd of [...commands].sort((a, b) => a.name.localeCompare(b.name))) {
      lines.push(`  ${colors.cyan(cmd.name.padEnd(width))}  ${colors.dim(cmd.describe)}`);
    }
    lines.push("");
  }

  lines.push(colors.bold("Global Options:"));
  lines.push("");
  const width = Math.max(...GLOBAL_OPTIONS.map((o) => o.name.length));
  for (const option of GLOBAL_OPTIONS) {
    lines.push(`  ${colors.cyan(option.name.padEnd(width))}  ${colors.dim(option.desc)}`);
  }
  lines.push("");
  lines.push(colors.dim("Use 'qprof <command> --help' for more information on a command."));

  return lines.join("\n");
}
