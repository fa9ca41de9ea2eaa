import { Command, Option } from "commander";

import { CommandSynthesisError, describeCause } from "../errors.js";
import {
  descriptorToRecord,
  isValidPluginName,
  PLUGIN_NAME_PATTERN,
  type PluginDescriptor
} from "../plugins/descriptor.js";

export type PluginCommandFlags = {
  ignoreCmd: boolean;
  print: boolean;
  runDetached: boolean;
  forceRezEnvTime?: string;
};

export type PluginInvocation = {
  flags: PluginCommandFlags;
  args: string[];
};

export type PluginCommandHandler = (
  descriptor: PluginDescriptor,
  invocation: PluginInvocation
) => Promise<number>;

export type PluginOptionDefinition = {
  flags: string;
  description: string;
  defaultValue?: boolean;
};

// Every plugin command exposes the same surface, whatever its descriptor says.
export const PLUGIN_OPTIONS: readonly PluginOptionDefinition[] = [
  {
    flags: "--ignore-cmd",
    description: "Ignore the plugin command and run the given arguments instead",
    defaultValue: false
  },
  {
    flags: "--print",
    description: "Print plugin details and exit",
    defaultValue: false
  },
  {
    flags: "--run-detached",
    description: "Run the command in detached mode",
    defaultValue: false
  },
  {
    flags: "--force-rez-env-time <value>",
    description: "Resolve packages as they were at the given time"
  }
];

export const PLUGIN_ARGUMENT = {
  name: "[args...]",
  description: "Arguments used as the command with --ignore-cmd"
};

export type PluginCommandDefinition = {
  descriptor: PluginDescriptor;
  options: readonly PluginOptionDefinition[];
  argument: typeof PLUGIN_ARGUMENT;
};

export type SynthesizeOptions = {
  handler: PluginCommandHandler;
  onExit: (exitCode: number) => void;
};

export function definePluginCommand(
  descriptor: PluginDescriptor
): PluginCommandDefinition {
  return { descriptor, options: PLUGIN_OPTIONS, argument: PLUGIN_ARGUMENT };
}

export function synthesizePluginCommand(
  descriptor: PluginDescriptor,
  options: SynthesizeOptions
): Command {
  const definition = definePluginCommand(descriptor);
  const printable = {
    ...definition,
    descriptor: descriptorToRecord(descriptor)
  };

  if (!isValidPluginName(descriptor.name)) {
    throw new CommandSynthesisError(
      descriptor.name,
      `plugin name does not match ${PLUGIN_NAME_PATTERN.source}`,
      printable
    );
  }

  try {
    return buildCommand(definition, options);
  } catch (error) {
    throw new CommandSynthesisError(
      descriptor.name,
      describeCause(error),
      printable,
      error
    );
  }
}

function buildCommand(
  definition: PluginCommandDefinition,
  options: SynthesizeOptions
): Command {
  const { descriptor } = definition;
  const command = new Command(descriptor.name)
    .description(descriptor.shortHelp)
    .helpOption(false)
    .allowUnknownOption()
    .passThroughOptions();

  for (const entry of definition.options) {
    const option = new Option(entry.flags, entry.description);
    if (entry.defaultValue !== undefined) {
      option.default(entry.defaultValue);
    }
    command.addOption(option);
  }

  command
    .argument(definition.argument.name, definition.argument.description)
    .action(async (args: string[] | undefined, flags: PluginCommandFlags) => {
      const exitCode = await options.handler(descriptor, { flags, args: args ?? [] });
      options.onExit(exitCode);
    });

  return command;
}
