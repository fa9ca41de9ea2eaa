import fs from "node:fs";
import path from "node:path";

import type { Logger } from "pino";

import type { RezToolsConfig } from "../config.js";
import { RezToolsError } from "../errors.js";
import { getLogger } from "../log.js";
import {
  finalizeDescriptor,
  readDescriptorFile,
  type ParsedDescriptorFile,
  type PluginDescriptor
} from "./descriptor.js";
import { resolveInheritance, type InheritanceEntry } from "./inheritance.js";

export type DiscoveryOptions = {
  config: RezToolsConfig;
  logger?: Logger;
};

/** Anything that can produce the flat, lowest-priority-first descriptor sequence. */
export type PluginSource = {
  discover(): PluginDescriptor[];
};

type PathScan = {
  dir: string;
  entries: InheritanceEntry[];
};

export class DiscoveryEngine implements PluginSource {
  private config: RezToolsConfig;
  private logger: Logger;

  constructor(options: DiscoveryOptions) {
    this.config = options.config;
    this.logger = options.logger ?? getLogger("plugins.discovery");
  }

  discover(): PluginDescriptor[] {
    const scans: PathScan[] = [];
    for (const dir of [...this.config.toolPaths].reverse()) {
      scans.push(this.scanPath(dir));
    }

    const allEntries = scans.flatMap((scan) => scan.entries);
    const inherited = resolveInheritance(allEntries, (failure) => {
      this.logger.warn({ file: failure.filePath }, failure.message);
    });

    const descriptors: PluginDescriptor[] = [];
    for (const scan of scans) {
      for (const entry of scan.entries) {
        const descriptor = entry.descriptor ?? inherited.get(entry);
        if (descriptor) {
          descriptors.push(descriptor);
        }
      }
    }

    this.logger.debug({ count: descriptors.length }, "Plugin discovery finished");
    return descriptors;
  }

  listDescriptorFiles(dir: string): string[] {
    const extension = this.config.extension;
    try {
      return fs
        .readdirSync(dir, { withFileTypes: true })
        .filter((entry) => entry.isFile() || entry.isSymbolicLink())
        .filter((entry) => entry.name.endsWith(extension))
        .filter((entry) => entry.name.length > extension.length)
        .map((entry) => entry.name)
        .sort()
        .map((name) => path.join(dir, name));
    } catch (error) {
      this.logger.debug(
        { dir, code: (error as NodeJS.ErrnoException).code },
        "Tool path is not readable, skipping"
      );
      return [];
    }
  }

  private scanPath(dir: string): PathScan {
    this.logger.debug({ dir }, "Scanning tool path");
    const plain: InheritanceEntry[] = [];
    const deferred: InheritanceEntry[] = [];

    for (const filePath of this.listDescriptorFiles(dir)) {
      const file = this.loadFile(filePath);
      if (!file) {
        continue;
      }
      if (file.fields.inherits_from !== undefined) {
        this.logger.debug(
          { plugin: file.name, parent: file.fields.inherits_from },
          "Deferring load of sub-plugin"
        );
        deferred.push({ file });
        continue;
      }
      try {
        plain.push({ file, descriptor: finalizeDescriptor(file) });
      } catch (error) {
        this.warnSkipped(filePath, error);
      }
    }

    return { dir, entries: [...plain, ...deferred] };
  }

  private loadFile(filePath: string): ParsedDescriptorFile | null {
    try {
      return readDescriptorFile(filePath, this.config.extension);
    } catch (error) {
      this.warnSkipped(filePath, error);
      return null;
    }
  }

  private warnSkipped(filePath: string, error: unknown): void {
    if (error instanceof RezToolsError) {
      this.logger.warn({ file: filePath }, error.message);
      return;
    }
    throw error;
  }
}
