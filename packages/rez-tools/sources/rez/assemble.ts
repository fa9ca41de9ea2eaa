import { quote } from "shell-quote";

import type { PluginDescriptor } from "../plugins/descriptor.js";

export const RESOLVER_SUBCOMMAND = "env";
export const QUIET_FLAG = "-q";
export const SEPARATOR = "--";

export type AssembleOptions = {
  resolver: string;
  overrideArgs?: readonly string[];
  resolverOptions?: Readonly<Record<string, string>>;
  platform?: NodeJS.Platform;
};

export type AssembledCommand = {
  file: string;
  args: string[];
  tokens: string[];
  commandLine: string;
};

export function assembleCommand(
  descriptor: PluginDescriptor,
  options: AssembleOptions
): AssembledCommand {
  const tokens = [options.resolver, RESOLVER_SUBCOMMAND, QUIET_FLAG];

  for (const [key, value] of Object.entries(options.resolverOptions ?? {})) {
    tokens.push(`--${key}`, value);
  }

  tokens.push(...descriptor.requires);
  tokens.push(SEPARATOR);

  if (options.overrideArgs && options.overrideArgs.length > 0) {
    tokens.push(...options.overrideArgs);
  } else {
    tokens.push(descriptor.command);
  }

  return {
    file: options.resolver,
    args: tokens.slice(1),
    tokens,
    commandLine: quoteCommandLine(tokens, options.platform ?? process.platform)
  };
}

export function quoteCommandLine(
  tokens: readonly string[],
  platform: NodeJS.Platform
): string {
  if (platform === "win32") {
    return tokens.map(quoteWindowsArgument).join(" ");
  }
  return quote(tokens);
}

// Follows the rules CommandLineToArgvW uses to split a command line back into arguments.
export function quoteWindowsArgument(argument: string): string {
  const needsQuotes = argument.length === 0 || /[ \t]/.test(argument);
  let result = needsQuotes ? "\"" : "";
  let backslashes = 0;

  for (const char of argument) {
    if (char === "\\") {
      backslashes += 1;
      continue;
    }
    if (char === "\"") {
      result += "\\".repeat(backslashes * 2 + 1) + "\"";
    } else {
      result += "\\".repeat(backslashes) + char;
    }
    backslashes = 0;
  }

  if (needsQuotes) {
    return `${result}${"\\".repeat(backslashes * 2)}"`;
  }
  return result + "\\".repeat(backslashes);
}
