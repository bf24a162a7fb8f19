import { describe, it, expect } from 'vitest';
import { stripAnsi } from '@qprof/cli-core';
import { version } from '../index';
import { createTestContext, invoke } from '../../../__tests__/helpers';

describe('version command', () => {
  it('should have correct name and description', () => {
    expect(version.name).toBe('version');
    expect(version.describe).toBe('Show CLI version');
  });

  it('should print the version, node and platform', async () => {
    const { ctx, presenter } = createTestContext({ cwd: '/' });

    const code = await invoke(version, ctx, []);

    expect(code).toBe(0);
    expect(presenter.out).toHaveLength(1);
    const lines = stripAnsi(presenter.out[0] ?? '').split('\n');
    expect(lines[1]).toMatch(/^│ Version:  1\.4\.0 +│$/);
    expect(lines[2]).toMatch(new RegExp(`^│ Node:     ${process.version.replace(/\./g, '\\.')} +│$`));
  });

  it('should work with JSON presenter', async () => {
    const { ctx, presenter } = createTestContext({ cwd: '/', json: true });

    await invoke(version, ctx, []);

    expect(presenter.payloads).toEqual([
      { ok: true, version: '1.4.0', node: process.version, platform: `${process.platform} ${process.arch}` },
    ]);
  });
});
