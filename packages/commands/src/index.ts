/**
 * @qprof/cli-commands
 * Public surface: types, registry, findCommand, registerBuiltinCommands, help rendering.
 * This package does not handle parsing argv/logging/exit.
 */
export * from './types';
export { InMemoryRegistry, registry, findCommand, type CommandRegistry } from './utils/registry';
export { registerBuiltinCommands, type RegisterBuiltinCommandsInput } from './utils/register';
export { defineCommand, type CommandDefinition } from './utils/define-command';
export { renderGlobalHelp } from './presentation/global-help';
export { renderCommandHelp } from './presentation/command-help';

export { createRunCommand, run } from './commands/run';
export { createResumeCommand, resume } from './commands/resume';
export { report, REPORT_FORMATS } from './commands/report';
export { createRangeCommand, range } from './commands/range';
export { version } from './commands/version';
export type { ProfilerDeps } from './commands/shared/session';
export {
  DEFAULT_SLEEP_SECONDS,
  DEFAULT_WORKERS,
  resolveProfileSettings,
  type ProfileSettings,
} from './commands/shared/profile-flags';
