import { createRangeCommand } from "../commands/range";
import { report } from "../commands/report";
import { createResumeCommand } from "../commands/resume";
import { createRunCommand } from "../commands/run";
import type { ProfilerDeps } from "../commands/shared/session";
import { version } from "../commands/version";
import { registry, type CommandRegistry } from "./registry";

export interface RegisterBuiltinCommandsInput {
  registry?: CommandRegistry;
  /** Injected into `run` and `resume`. */
  deps?: ProfilerDeps;
  now?: () => number;
}

const registeredInto = new WeakSet<CommandRegistry>();

/** Idempotent per registry. */
export function registerBuiltinCommands(input: RegisterBuiltinCommandsInput = {}): CommandRegistry {
  const target = input.registry ?? registry;
  if (registeredInto.has(target)) {
    return target;
  }
  registeredInto.add(target);

  target.register(createRunCommand(input.deps));
  target.register(createResumeCommand(input.deps));
  target.register(report);
  target.register(createRangeCommand(input.now ?? input.deps?.now ?? Date.now));
  target.register(version);
  return target;
}
