export { runCli, readGlobalFlags, VERSION } from "./cli.js";
export type { CliOptions, GlobalFlags } from "./cli.js";
export { loadConfig, readConfigFile, defaultConfig, expandHome } from "./config.js";
export type { RezToolsConfig, LoadConfigOptions } from "./config.js";
export * from "./errors.js";
export { initLogging, getLogger } from "./log.js";
export {
  descriptorToRecord,
  finalizeDescriptor,
  parseDescriptorSource,
  readDescriptorFile,
  PLUGIN_NAME_PATTERN
} from "./plugins/descriptor.js";
export type { PluginDescriptor, DescriptorFields } from "./plugins/descriptor.js";
export { DiscoveryEngine } from "./plugins/discovery.js";
export type { DiscoveryOptions, PluginSource } from "./plugins/discovery.js";
export { resolveInheritance, mergeDescriptorFields } from "./plugins/inheritance.js";
export { PluginRegistry } from "./plugins/registry.js";
export type { PluginFilter, PluginRegistryOptions } from "./plugins/registry.js";
export { PluginDispatcher } from "./commands/dispatcher.js";
export {
  PLUGIN_OPTIONS,
  definePluginCommand,
  synthesizePluginCommand
} from "./commands/plugin-command.js";
export type {
  PluginCommandFlags,
  PluginCommandHandler,
  PluginInvocation
} from "./commands/plugin-command.js";
export { createPluginRunner, buildResolverOptions } from "./commands/run-plugin.js";
export { assembleCommand, quoteCommandLine } from "./rez/assemble.js";
export type { AssembledCommand, AssembleOptions } from "./rez/assemble.js";
export { executeCommand } from "./rez/executor.js";
export type { CommandExecutor, ExecuteOptions } from "./rez/executor.js";
export { locateResolver } from "./rez/resolver.js";
export type { ResolverLocation } from "./rez/resolver.js";
