import { z } from 'zod';
import { box, keyValue } from '@qprof/cli-core';
import type { Command } from '../../types';
import { defineCommand } from '../../utils/define-command';

export const version: Command = defineCommand({
  name: 'version',
  describe: 'Show CLI version',
  longDescription: 'Displays the CLI version together with the Node.js runtime and platform',
  flags: [],
  examples: ['qprof version', 'qprof version --json'],
  schema: z.object({}),
  async handler(ctx) {
    const cliVersion = ctx.cliVersion;
    const node = process.version;
    const platform = `${process.platform} ${process.arch}`;
    ctx.logger.debug('Version command executed', { version: cliVersion, node, platform });

    if (ctx.presenter.isJSON) {
      ctx.presenter.json({ ok: true, version: cliVersion, node, platform });
      return 0;
    }
    ctx.presenter.write(box('qprof', keyValue({ Version: cliVersion, Node: node, Platform: platform })));
    return 0;
  },
});
