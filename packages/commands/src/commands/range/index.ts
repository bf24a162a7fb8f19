import { z } from 'zod';
import { keyValue } from '@qprof/cli-core';
import { calculateRange, DEFAULT_RANGE } from '@qprof/query-profiler';
import type { Command } from '../../types';
import { defineCommand } from '../../utils/define-command';
import { rangeFlag } from '../shared/profile-flags';

const RangeFlagsSchema = z.object({
  range: z.string().min(1).optional(),
});

export function createRangeCommand(now: () => number = Date.now): Command {
  return defineCommand({
    name: 'range',
    describe: 'Show the from/to window a --range value resolves to',
    flags: [rangeFlag],
    examples: ['qprof range -r 15m', 'qprof range -r -1d:2h --json'],
    schema: RangeFlagsSchema,
    async handler(ctx, _argv, flags) {
      const spec = flags.range ?? ctx.config.range ?? DEFAULT_RANGE;
      const { from, to } = calculateRange(spec, now());
      const fromIso = new Date(from).toISOString();
      const toIso = new Date(to).toISOString();

      if (ctx.presenter.isJSON) {
        ctx.presenter.json({ ok: true, range: spec, from, to, fromIso, toIso });
        return 0;
      }
      for (const line of keyValue({ range: spec, from: `${fromIso} (${from})`, to: `${toIso} (${to})` })) {
        ctx.presenter.write(line);
      }
      return 0;
    },
  });
}

export const range = createRangeCommand();
