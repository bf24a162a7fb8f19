import type { Command, CommandLookup } from "../types";

export interface CommandRegistry extends CommandLookup {
  register(cmd: Command): void;
  has(name: string): boolean;
  clear(): void;
}

export class InMemoryRegistry implements CommandRegistry {
  private byName = new Map<string, Command>();
  private commands = new Map<string, Command>();

  register(cmd: Command): void {
    const previous = this.commands.get(cmd.name);
    if (previous) {
      for (const alias of previous.aliases ?? []) {
        this.byName.delete(alias);
      }
    }
    this.commands.set(cmd.name, cmd);
    this.byName.set(cmd.name, cmd);
    for (const a of cmd.aliases ?? []) {
      this.byName.set(a, cmd);
    }
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): Command | undefined {
    return this.byName.get(name);
  }

  /** Registered commands sorted by name, aliases not repeated. */
  list(): Command[] {
    return [...this.commands.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  clear(): void {
    this.byName.clear();
    this.commands.clear();
  }
}

export const registry = new InMemoryRegistry();

/** Commands are one word; extra path segments are positional arguments. */
export function findCommand(
  cmdPath: string[],
  lookup: CommandLookup = registry,
): { cmd: Command; rest: string[] } | undefined {
  const [name, ...rest] = cmdPath;
  if (!name) {
    return undefined;
  }
  const cmd = lookup.get(name);
  return cmd ? { cmd, rest } : undefined;
}
