/**
 * Version resolution helpers
 */

/** Kept in step with the package version. */
export const CLI_VERSION = "1.4.0";

/**
 * Resolve CLI version from options or env
 */
export function resolveVersion(
  optionsVersion: string | undefined,
  env: NodeJS.ProcessEnv,
): string {
  return optionsVersion ?? env.QPROF_VERSION ?? CLI_VERSION;
}
