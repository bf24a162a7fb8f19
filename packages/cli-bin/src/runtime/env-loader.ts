/**
 * Loading of environment variables from a .env file
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { CliError, CLI_ERROR_CODES, errorMessage } from '@qprof/cli-core';

/**
 * Loads KEY=VALUE lines from `<cwd>/.env` into `env`.
 * Variables already set win. Returns the names that were set.
 */
export function loadEnvFile(cwd: string, env: NodeJS.ProcessEnv = process.env): string[] {
  const envPath = join(cwd, '.env');

  if (!existsSync(envPath)) {
    return [];
  }

  let content: string;
  try {
    content = readFileSync(envPath, 'utf-8');
  } catch (error) {
    throw new CliError(CLI_ERROR_CODES.E_IO_READ, `Failed to read ${envPath}: ${errorMessage(error)}`, {
      path: envPath,
    });
  }

  const loaded: string[] = [];
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();

    // Skip comments and blank lines
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const equalIndex = trimmed.indexOf('=');
    if (equalIndex === -1) {
      continue;
    }

    const key = trimmed
      .substring(0, equalIndex)
      .trim()
      .replace(/^export\s+/, '');
    const value = trimmed.substring(equalIndex + 1).trim();

    const unquotedValue = value
      .replace(/^"(.*)"$/, '$1')
      .replace(/^'(.*)'$/, '$1')
      .replace(/^`(.*)`$/, '$1');

    if (key && !(key in env)) {
      env[key] = unquotedValue;
      loaded.push(key);
    }
  }
  return loaded;
}
