/**
 * @qprof/cli-bin
 * Executable entry: env file, logging, config, dispatch and exit codes.
 */
import { executeCli, type CliRuntimeOptions } from './runtime/bootstrap';

export { executeCli, type CliRuntimeOptions };
export { loadEnvFile } from './runtime/env-loader';
export { createTimingMiddleware } from './runtime/middlewares/timing';

export function run(argv: string[], options?: CliRuntimeOptions): Promise<number> {
  return executeCli(argv, options);
}
