import { colors, type FlagDefinition } from '@qprof/cli-core';
import type { Command } from '../types';

function flagLabel(flag: FlagDefinition): string {
  const long = `--${flag.name}`;
  const named = flag.alias ? `-${flag.alias}, ${long}` : `    ${long}`;
  if (flag.type === 'boolean') {
    return named;
  }
  return `${named} <${flag.type === 'number' ? 'n' : 'value'}>`;
}

function flagNotes(flag: FlagDefinition): string {
  const notes: string[] = [];
  if (flag.required) {
    notes.push('required');
  }
  if (flag.type === 'array') {
    notes.push('repeatable');
  }
  if (flag.choices) {
    notes.push(flag.choices.join('|'));
  }
  if (flag.default !== undefined) {
    notes.push(`default: ${String(flag.default)}`);
  }
  return notes.length > 0 ? ` [${notes.join(', ')}]` : '';
}

export function renderCommandHelp(cmd: Command): string {
  const lines: string[] = [];

  lines.push(colors.cyan(colors.bold(`qprof ${cmd.name}`)) + ' - ' + cmd.describe);
  if (cmd.longDescription) {
    lines.push('');
    lines.push(cmd.longDescription);
  }
  lines.push('');
  lines.push(colors.bold('Usage:') + ` qprof ${cmd.name} [options]`);
  if (cmd.aliases && cmd.aliases.length > 0) {
    lines.push(colors.bold('Aliases:') + ` ${cmd.aliases.join(', ')}`);
  }

  const flags = cmd.flags ?? [];
  if (flags.length > 0) {
    lines.push('');
    lines.push(colors.bold('Options:'));
    lines.push('');
    const labels = flags.map(flagLabel);
    const width = Math.max(...labels.map((l) => l.length));
    flags.forEach((flag, i) => {
      const label = labels[i] ?? '';
      lines.push(`  ${colors.cyan(label.padEnd(width))}  ${colors.dim((flag.description ?? '') + flagNotes(flag))}`);
    });
  }

  if (cmd.examples && cmd.examples.length > 0) {
    lines.push('');
    lines.push(colors.bold('Examples:'));
    lines.push('');
    for (const example of cmd.examples) {
      lines.push(`  ${colors.dim(example)}`);
    }
  }

  return lines.join('\n');
}
