/**
 * @module @qprof/cli-runtime/formatters/formatters-registry
 * Output formatters registry
 */

import { CliError, CLI_ERROR_CODES, type FormatterLookup } from "@qprof/cli-core";

export interface OutputFormatter {
  name: "json" | "yaml" | "table" | "markdown" | (string & {});
  format(data: unknown): string;
}

export class FormattersRegistry implements FormatterLookup {
  private formatters: Map<string, OutputFormatter> = new Map();

  register(formatter: OutputFormatter): void {
    this.formatters.set(formatter.name, formatter);
  }

  has(name: string): boolean {
    return this.formatters.has(name);
  }

  get(name: string): OutputFormatter | undefined {
    return this.formatters.get(name);
  }

  names(): string[] {
    return [...this.formatters.keys()];
  }

  format(data: unknown, formatName: string): string {
    const formatter = this.formatters.get(formatName);
    if (!formatter) {
      throw new CliError(
        CLI_ERROR_CODES.E_INVALID_FLAGS,
        `Formatter "${formatName}" not found. Available: ${this.names().join(", ")}`,
      );
    }
    return formatter.format(data);
  }
}
