import type { Command } from "commander";

import type { PluginRegistry } from "../plugins/registry.js";
import {
  PLUGIN_OPTIONS,
  synthesizePluginCommand,
  type SynthesizeOptions
} from "./plugin-command.js";

export type PluginDispatcherOptions = SynthesizeOptions & {
  registry: PluginRegistry;
};

const HELP_COLUMN_WIDTH = 20;

export class PluginDispatcher {
  private registry: PluginRegistry;
  private synthesizeOptions: SynthesizeOptions;
  private commands = new Map<string, Command>();

  constructor(options: PluginDispatcherOptions) {
    this.registry = options.registry;
    this.synthesizeOptions = { handler: options.handler, onExit: options.onExit };
  }

  getCommand(name: string): Command | null {
    const cached = this.commands.get(name);
    if (cached) {
      return cached;
    }
    const descriptor = this.registry.resolve(name);
    if (!descriptor) {
      return null;
    }
    const command = synthesizePluginCommand(descriptor, this.synthesizeOptions);
    this.commands.set(name, command);
    return command;
  }

  listSynthesized(): string[] {
    return Array.from(this.commands.keys());
  }

  formatPluginHelp(): string {
    const lines: string[] = [];
    const descriptors = this.registry.descriptors();
    if (descriptors.length > 0) {
      lines.push("", "Plugin Commands:");
      for (const descriptor of descriptors) {
        const name = descriptor.name.padEnd(HELP_COLUMN_WIDTH);
        lines.push(`  ${name} ${descriptor.shortHelp}`);
      }
    }
    const flagWidth = Math.max(...PLUGIN_OPTIONS.map((option) => option.flags.length));
    lines.push("", "Plugin Options:");
    for (const option of PLUGIN_OPTIONS) {
      lines.push(`  ${option.flags.padEnd(flagWidth)}  ${option.description}`);
    }
    return lines.join("\n");
  }
}
