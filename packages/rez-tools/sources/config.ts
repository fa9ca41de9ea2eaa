import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { ConfigError, describeCause } from "./errors.js";

export type RezToolsConfig = Readonly<{
  toolPaths: readonly string[];
  extension: string;
  resolver?: string;
  configPath?: string;
}>;

export const CONFIG_ENV = "REZ_TOOL_CONFIG";
export const DEFAULT_CONFIG_FILENAME = ".reztoolsconfig.yaml";
export const DEFAULT_EXTENSION = ".rt";

const configFileSchema = z
  .object({
    tool_paths: z.array(z.string().min(1)).optional(),
    extension: z.string().min(1).optional(),
    resolver: z.string().min(1).optional()
  })
  .strict();

type ConfigFile = z.infer<typeof configFileSchema>;

export type LoadConfigOptions = {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
};

export function defaultConfig(homeDir: string = os.homedir()): RezToolsConfig {
  return Object.freeze({
    toolPaths: Object.freeze([path.join(homeDir, "packages")]),
    extension: DEFAULT_EXTENSION
  });
}

export function loadConfig(options: LoadConfigOptions = {}): RezToolsConfig {
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? os.homedir();

  const explicitPath = env[CONFIG_ENV]?.trim();
  if (explicitPath) {
    const resolvedPath = path.resolve(expandHome(explicitPath, homeDir));
    if (!fs.existsSync(resolvedPath)) {
      throw new ConfigError(`Config file not found: ${resolvedPath}`);
    }
    return readConfigFile(resolvedPath, homeDir);
  }

  const defaultPath = path.join(homeDir, DEFAULT_CONFIG_FILENAME);
  if (fs.existsSync(defaultPath)) {
    return readConfigFile(defaultPath, homeDir);
  }
  return defaultConfig(homeDir);
}

export function readConfigFile(
  filePath: string,
  homeDir: string = os.homedir()
): RezToolsConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(`Unable to read config ${filePath}: ${describeCause(error)}`, {
      cause: error
    });
  }

  let data: unknown;
  try {
    data = parseYaml(raw);
  } catch (error) {
    throw new ConfigError(`Unable to parse config ${filePath}: ${describeCause(error)}`, {
      cause: error
    });
  }

  const parsed = configFileSchema.safeParse(data ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config ${filePath}: ${issues}`);
  }

  return buildConfig(parsed.data, path.dirname(filePath), homeDir, filePath);
}

function buildConfig(
  file: ConfigFile,
  baseDir: string,
  homeDir: string,
  configPath: string
): RezToolsConfig {
  const defaults = defaultConfig(homeDir);
  const toolPaths =
    file.tool_paths && file.tool_paths.length > 0
      ? file.tool_paths.map((entry) => path.resolve(baseDir, expandHome(entry, homeDir)))
      : defaults.toolPaths;

  return Object.freeze({
    toolPaths: Object.freeze([...toolPaths]),
    extension: file.extension ?? defaults.extension,
    resolver: file.resolver
      ? resolveResolverSetting(file.resolver, baseDir, homeDir)
      : undefined,
    configPath
  });
}

// A bare executable name stays as is so the spawn looks it up on PATH.
function resolveResolverSetting(value: string, baseDir: string, homeDir: string): string {
  const expanded = expandHome(value, homeDir);
  if (!expanded.includes("/") && !expanded.includes("\\")) {
    return expanded;
  }
  return path.resolve(baseDir, expanded);
}

export function expandHome(value: string, homeDir: string = os.homedir()): string {
  if (value === "~") {
    return homeDir;
  }
  if (value.startsWith("~/") || value.startsWith("~\\")) {
    return path.join(homeDir, value.slice(2));
  }
  return value;
}
