import type { PluginRegistry } from "../plugins/registry.js";

export function listCommand(
  registry: PluginRegistry,
  write: (text: string) => void
): number {
  const descriptors = registry.descriptors();
  if (descriptors.length === 0) {
    write("No plugins found.\n");
    return 0;
  }

  const lines = ["Available plugins:"];
  for (const descriptor of descriptors) {
    lines.push(`  ${descriptor.name.padEnd(20)} ${descriptor.shortHelp}`);
  }
  write(`${lines.join("\n")}\n`);
  return 0;
}
