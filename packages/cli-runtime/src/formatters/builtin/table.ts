/**
 * @module @qprof/cli-runtime/formatters/builtin/table
 * Table formatter
 */

import Table from 'cli-table3';
import type { OutputFormatter } from '../formatters-registry';
import { cellText, isRecord } from './values';

// Colors come from the presenter, not from cli-table3.
const plain = { style: { head: [], border: [] } };

export const tableFormatter: OutputFormatter = {
  name: 'table',
  format(data: unknown): string {
    if (!data || typeof data !== 'object') {
      return JSON.stringify(data);
    }

    if (Array.isArray(data)) {
      if (data.length === 0) return '';

      const firstItem: unknown = data[0];
      if (!isRecord(firstItem)) {
        // Simple array
        const table = new Table(plain);
        data.forEach((item: unknown, i) => table.push([String(i), cellText(item)]));
        return table.toString();
      }

      // Array of objects
      const keys = Object.keys(firstItem);
      const table = new Table({ ...plain, head: keys });
      data.forEach((item: unknown) => {
        table.push(keys.map((k) => cellText(isRecord(item) ? item[k] : undefined)));
      });
      return table.toString();
    }

    // Single object
    const table = new Table(plain);
    Object.entries(data).forEach(([key, value]) => {
      table.push([key, cellText(value)]);
    });
    return table.toString();
  },
};
