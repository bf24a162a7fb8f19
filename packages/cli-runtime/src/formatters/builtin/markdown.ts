/**
 * @module @qprof/cli-runtime/formatters/builtin/markdown
 * Markdown formatter
 */

import type { OutputFormatter } from '../formatters-registry';
import { cellText, isRecord } from './values';

const escapeCell = (value: unknown): string => cellText(value).replace(/\|/g, '\\|');

export const markdownFormatter: OutputFormatter = {
  name: 'markdown',
  format(data: unknown): string {
    if (!data || typeof data !== 'object') {
      return `\`${JSON.stringify(data)}\``;
    }

    if (Array.isArray(data)) {
      if (data.length === 0) return '';

      const firstItem: unknown = data[0];
      if (!isRecord(firstItem)) {
        return data.map((item: unknown) => `- ${cellText(item)}`).join('\n');
      }

      // Array of objects - create table
      const keys = Object.keys(firstItem);
      const header = `| ${keys.join(' | ')} |`;
      const separator = `| ${keys.map(() => '---').join(' | ')} |`;
      const rows = data.map((item: unknown) => {
        const values = keys.map((k) => escapeCell(isRecord(item) ? item[k] : undefined));
        return `| ${values.join(' | ')} |`;
      });
      return [header, separator, ...rows].join('\n');
    }

    // Single object
    return Object.entries(data)
      .map(([key, value]) => `- **${key}**: ${cellText(value)}`)
      .join('\n');
  },
};
