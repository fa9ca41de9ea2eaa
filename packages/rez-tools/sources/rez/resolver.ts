import fs from "node:fs";

import type { RezToolsConfig } from "../config.js";
import { getLogger } from "../log.js";

export const REZ_PATH_ENV = "REZ_PATH";
export const DEFAULT_RESOLVER = "rez";

const logger = getLogger("rez.resolver");

export type ResolverSource = "env" | "config" | "default";

export type ResolverLocation = {
  command: string;
  source: ResolverSource;
};

export function locateResolver(
  config: RezToolsConfig,
  env: NodeJS.ProcessEnv = process.env
): ResolverLocation {
  const fromEnv = env[REZ_PATH_ENV]?.trim();
  if (fromEnv) {
    if (fs.existsSync(fromEnv)) {
      return { command: fromEnv, source: "env" };
    }
    logger.warn(
      { path: fromEnv },
      `${REZ_PATH_ENV} points to a non-existent path, ignoring`
    );
  }
  if (config.resolver) {
    return { command: config.resolver, source: "config" };
  }
  return { command: DEFAULT_RESOLVER, source: "default" };
}
