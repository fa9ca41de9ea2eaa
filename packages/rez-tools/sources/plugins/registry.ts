import type { Logger } from "pino";

import type { RezToolsConfig } from "../config.js";
import { getLogger } from "../log.js";
import type { PluginDescriptor } from "./descriptor.js";
import { DiscoveryEngine, type PluginSource } from "./discovery.js";

export type PluginFilter = (descriptor: PluginDescriptor) => boolean;

export type PluginRegistryOptions = {
  config: RezToolsConfig;
  source?: PluginSource;
  filter?: PluginFilter;
  logger?: Logger;
};

export class PluginRegistry {
  private source: PluginSource;
  private filter: PluginFilter;
  private logger: Logger;
  private plugins: ReadonlyMap<string, PluginDescriptor> | null = null;

  constructor(options: PluginRegistryOptions) {
    this.logger = options.logger ?? getLogger("plugins.registry");
    this.source =
      options.source ??
      new DiscoveryEngine({ config: options.config, logger: options.logger });
    this.filter = options.filter ?? (() => true);
  }

  resolve(name: string): PluginDescriptor | null {
    return this.populate().get(name) ?? null;
  }

  list(): string[] {
    return this.descriptors().map((descriptor) => descriptor.name);
  }

  descriptors(): PluginDescriptor[] {
    return Array.from(this.populate().values())
      .filter((descriptor) => this.filter(descriptor))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  private populate(): ReadonlyMap<string, PluginDescriptor> {
    if (this.plugins) {
      return this.plugins;
    }
    const plugins = new Map<string, PluginDescriptor>();
    for (const descriptor of this.source.discover()) {
      plugins.set(descriptor.name, descriptor);
    }
    this.logger.debug({ count: plugins.size }, "Plugin registry populated");
    this.plugins = plugins;
    return plugins;
  }
}
