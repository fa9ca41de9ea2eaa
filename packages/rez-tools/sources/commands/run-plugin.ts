import { descriptorToRecord, type PluginDescriptor } from "../plugins/descriptor.js";
import { assembleCommand } from "../rez/assemble.js";
import type { CommandExecutor } from "../rez/executor.js";
import type { PluginCommandFlags, PluginCommandHandler } from "./plugin-command.js";

export type PluginRunnerOptions = {
  resolver: string;
  execute: CommandExecutor;
  write: (text: string) => void;
  platform?: NodeJS.Platform;
};

export function buildResolverOptions(
  descriptor: PluginDescriptor,
  flags: PluginCommandFlags
): Record<string, string> {
  const resolverOptions: Record<string, string> = { ...descriptor.rezOpts };
  if (flags.forceRezEnvTime) {
    resolverOptions.time = flags.forceRezEnvTime;
  }
  return resolverOptions;
}

/** The one handler every synthesized plugin command dispatches to. */
export function createPluginRunner(options: PluginRunnerOptions): PluginCommandHandler {
  return async (descriptor, { flags, args }) => {
    if (flags.print) {
      options.write(`${JSON.stringify(descriptorToRecord(descriptor), null, 2)}\n`);
      return 0;
    }

    const command = assembleCommand(descriptor, {
      resolver: options.resolver,
      overrideArgs: flags.ignoreCmd ? args : undefined,
      resolverOptions: buildResolverOptions(descriptor, flags),
      platform: options.platform
    });

    return options.execute(command, {
      detached: descriptor.runDetached || flags.runDetached
    });
  };
}
