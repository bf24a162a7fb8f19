import {
  createJsonPresenter,
  createTextPresenter,
  getLogger,
  initLogging,
  loadConfig,
  parseArgs,
  resolveCommandFlags,
  setColorEnabled,
  CliError,
  CLI_ERROR_CODES,
  errorMessage,
  mapCliErrorToExitCode,
  type CliContext,
  type Presenter,
} from "@qprof/cli-core";
import {
  findCommand,
  registerBuiltinCommands,
  renderCommandHelp,
  renderGlobalHelp,
  registry,
  type Command,
  type CommandRegistry,
} from "@qprof/cli-commands";
import {
  createCliRuntime,
  type MiddlewareConfig,
  type OutputFormatter,
} from "@qprof/cli-runtime";
import { getDefaultMiddlewares } from "./middlewares";
import { loadEnvFile } from "./env-loader";
import { resolveLogLevel } from "./helpers/log-level";
import { resolveVersion } from "./helpers/version";

export interface CliRuntimeOptions {
  env?: NodeJS.ProcessEnv;
  version?: string;
  cwd?: string;
  registry?: CommandRegistry;
  registerBuiltinCommands?: (input: { registry: CommandRegistry }) => void;
  createJsonPresenter?: typeof createJsonPresenter;
  createTextPresenter?: typeof createTextPresenter;
  runtimeMiddlewares?: MiddlewareConfig[];
  runtimeFormatters?: OutputFormatter[];
}

export async function executeCli(
  argv: string[],
  options: CliRuntimeOptions = {},
): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const { cmdPath, rest, global, flagsObj } = parseArgs(argv);

  if (global.noColor) {
    setColorEnabled(false);
  }

  const presenter = global.json
    ? (options.createJsonPresenter ?? createJsonPresenter)()
    : (options.createTextPresenter ?? createTextPresenter)(global.quiet);

  let ctx: CliContext | undefined;

  try {
    // Existing variables win over .env entries
    const fromEnvFile = loadEnvFile(cwd, env);

    // Default to 'silent' so stderr stays quiet unless asked
    const logLevel = global.debug
      ? "debug"
      : resolveLogLevel(global.logLevel ?? env.QPROF_LOG_LEVEL ?? env.LOG_LEVEL);
    initLogging({ level: logLevel });

    const version = resolveVersion(options.version, env);
    const logger = getLogger("cli").child({ meta: { version } });
    if (fromEnvFile.length > 0) {
      logger.debug("Loaded .env", { variables: fromEnvFile });
    }

    const commands = options.registry ?? registry;
    (options.registerBuiltinCommands ?? registerBuiltinCommands)({ registry: commands });

    if (global.version) {
      if (global.json) {
        presenter.json({ ok: true, version });
      } else {
        presenter.write(version);
      }
      return 0;
    }

    if (global.help && cmdPath.length === 0) {
      if (global.json) {
        presenter.json({
          ok: true,
          commands: commands.list().map((cmd) => ({ name: cmd.name, describe: cmd.describe })),
        });
      } else {
        presenter.write(renderGlobalHelp(commands.list()));
      }
      return 0;
    }

    if (cmdPath.length === 0) {
      throw new CliError(
        CLI_ERROR_CODES.E_CMD_NOT_FOUND,
        "No command given. Use 'qprof --help' to list commands",
      );
    }

    const found = findCommand(cmdPath, commands);
    if (!found) {
      throw new CliError(CLI_ERROR_CODES.E_CMD_NOT_FOUND, `Unknown command: ${cmdPath.join(" ")}`, {
        command: cmdPath.join(" "),
      });
    }
    const { cmd } = found;

    if (global.help) {
      if (global.json) {
        presenter.json({ ok: true, command: describeCommand(cmd) });
      } else {
        presenter.write(renderCommandHelp(cmd));
      }
      return 0;
    }

    const loaded = loadConfig({ cwd, explicitPath: global.config });
    if (loaded.path) {
      logger.debug("Loaded config", { path: loaded.path });
    }

    const runtime = createCliRuntime({
      presenter,
      logger: logger.child({ category: cmd.name }),
      env,
      cwd,
      config: loaded.config,
      cliVersion: version,
      middlewares: options.runtimeMiddlewares ?? getDefaultMiddlewares(),
      formatters: options.runtimeFormatters,
    });
    ctx = runtime.context;

    const flags = resolveCommandFlags(flagsObj, cmd.flags ?? []);
    const args = [...found.rest, ...rest];

    return await runtime.execute((context) => cmd.run(context, args, flags));
  } catch (error: unknown) {
    return handleExecutionError(error, presenter, ctx);
  }
}

function describeCommand(cmd: Command) {
  return {
    name: cmd.name,
    describe: cmd.describe,
    longDescription: cmd.longDescription,
    aliases: cmd.aliases ?? [],
    flags: cmd.flags ?? [],
    examples: cmd.examples ?? [],
  };
}

function handleExecutionError(
  error: unknown,
  presenter: Presenter,
  ctx: CliContext | undefined,
): number {
  presenter.fail(error, ctx?.diagnostics);

  if (error instanceof CliError) {
    return mapCliErrorToExitCode(error.code);
  }
  getLogger("cli").error("Unhandled error", error instanceof Error ? error : { error: errorMessage(error) });
  return 1;
}
