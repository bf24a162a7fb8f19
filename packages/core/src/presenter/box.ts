import { colors, stripAnsi } from "./colors";

/**
 * Frame lines in a unicode box with the title in the top border.
 */
export function box(title: string, lines: string[]): string {
  const width = Math.max(
    stripAnsi(title).length + 2,
    ...lines.map((line) => stripAnsi(line).length),
  );
  const top = `┌─ ${colors.bold(title)} ${"─".repeat(width - stripAnsi(title).length - 1)}┐`;
  const body = lines.map((line) => {
    const pad = width - stripAnsi(line).length;
    return `│ ${line}${" ".repeat(pad)} │`;
  });
  const bottom = `└${"─".repeat(width + 2)}┘`;
  return [top, ...body, bottom].join("\n");
}

export function keyValue(pairs: Record<string, string | number>): string[] {
  const keys = Object.keys(pairs);
  const widest = Math.max(0, ...keys.map((k) => k.length));
  return keys.map((key) => `${colors.dim(`${key}:`.padEnd(widest + 1))} ${String(pairs[key])}`);
}
