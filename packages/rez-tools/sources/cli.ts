import { Command, CommanderError } from "commander";

import { checkRezCommand } from "./commands/check-rez.js";
import { PluginDispatcher } from "./commands/dispatcher.js";
import { listCommand } from "./commands/list.js";
import { createPluginRunner } from "./commands/run-plugin.js";
import { loadConfig, type RezToolsConfig } from "./config.js";
import { RezToolsError } from "./errors.js";
import { getLogger, initLogging } from "./log.js";
import type { PluginFilter } from "./plugins/registry.js";
import { PluginRegistry } from "./plugins/registry.js";
import { executeCommand, type CommandExecutor } from "./rez/executor.js";
import { locateResolver } from "./rez/resolver.js";

export const VERSION = "0.1.0";

const BUILTIN_COMMANDS = new Set(["list", "ls", "check-rez", "help"]);
const GLOBAL_FLAGS = new Set(["-v", "--verbose", "-q", "--quiet"]);

export type CliOptions = {
  env?: NodeJS.ProcessEnv;
  config?: RezToolsConfig;
  execute?: CommandExecutor;
  filter?: PluginFilter;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
};

export type GlobalFlags = {
  verbose: boolean;
  quiet: boolean;
  commandName?: string;
  helpTarget?: string;
};

/**
 * Reads the global flags and the requested command name ahead of full parsing.
 * For `help <command>`, the command asked about is returned as `helpTarget`.
 */
export function readGlobalFlags(args: readonly string[]): GlobalFlags {
  const flags: GlobalFlags = { verbose: false, quiet: false };
  for (const [index, arg] of args.entries()) {
    if (arg === "-v" || arg === "--verbose") {
      flags.verbose = true;
      continue;
    }
    if (arg === "-q" || arg === "--quiet") {
      flags.quiet = true;
      continue;
    }
    if (arg.startsWith("-")) {
      continue;
    }
    flags.commandName = arg;
    if (arg === "help") {
      flags.helpTarget = args.slice(index + 1).find((next) => !next.startsWith("-"));
    }
    break;
  }
  return flags;
}

export async function runCli(
  argv: readonly string[],
  options: CliOptions = {}
): Promise<number> {
  const stdout = options.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = options.stderr ?? ((text: string) => process.stderr.write(text));
  const env = options.env ?? process.env;
  const args = argv.slice(2);
  const globals = readGlobalFlags(args);

  initLogging({ verbose: globals.verbose, quiet: globals.quiet, env });
  const logger = getLogger("cli");

  let exitCode = 0;
  const output = { writeOut: stdout, writeErr: stderr };

  try {
    const config = options.config ?? loadConfig({ env });
    logger.debug(
      { toolPaths: config.toolPaths, extension: config.extension },
      "Loaded config"
    );

    const registry = new PluginRegistry({ config, filter: options.filter });
    const resolver = locateResolver(config, env);
    const dispatcher = new PluginDispatcher({
      registry,
      handler: createPluginRunner({
        resolver: resolver.command,
        execute: options.execute ?? executeCommand,
        write: stdout
      }),
      onExit: (code) => {
        exitCode = code;
      }
    });

    const program = new Command();
    program
      .name("rt")
      .description("A suite tool command line for rez")
      .version(VERSION, "-V, --version")
      .usage("[options] PLUGIN [PLUGIN OPTIONS]")
      .enablePositionalOptions()
      .option("-v, --verbose", "Enable verbose logging")
      .option("-q, --quiet", "Only log errors")
      .exitOverride()
      .configureOutput(output)
      .addHelpText("after", () => dispatcher.formatPluginHelp());

    program
      .command("list")
      .alias("ls")
      .description("List all available plugins")
      .action(() => {
        exitCode = listCommand(registry, stdout);
      });

    program
      .command("check-rez")
      .description("Show which rez executable is used and whether it runs")
      .action(async () => {
        exitCode = await checkRezCommand(resolver, stdout);
      });

    if (args.every((arg) => GLOBAL_FLAGS.has(arg))) {
      program.outputHelp();
      return 0;
    }

    const name =
      globals.commandName === "help" ? globals.helpTarget : globals.commandName;
    if (name !== undefined && !BUILTIN_COMMANDS.has(name)) {
      const command = dispatcher.getCommand(name);
      if (command) {
        program.addCommand(command.exitOverride().configureOutput(output));
      }
    }

    await program.parseAsync([...argv]);
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof RezToolsError) {
      logger.debug({ err: error }, "Command failed");
      stderr(`Error: ${error.message}\n`);
      return error.exitCode;
    }
    throw error;
  }
}
