import fs from "node:fs";
import path from "node:path";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import {
  DescriptorParseError,
  DescriptorReadError,
  DescriptorValidationError
} from "../errors.js";

export const PLUGIN_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]+$/;

const scalarSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

export const descriptorFileSchema = z.object({
  name: z.string().optional(),
  command: z.string().optional(),
  requires: z.array(z.string()).optional(),
  inherits_from: z.string().min(1).optional(),
  short_help: z.string().optional(),
  run_detached: z.boolean().optional(),
  rez_opts: z.record(z.string(), scalarSchema).optional()
});

/** Fields as written in a descriptor file, before defaults are applied. */
export type DescriptorFields = z.infer<typeof descriptorFileSchema>;

export type PluginDescriptor = Readonly<{
  name: string;
  command: string;
  requires: readonly string[];
  inheritsFrom?: string;
  shortHelp: string;
  runDetached: boolean;
  rezOpts: Readonly<Record<string, string>>;
  filePath: string;
}>;

/**
 * A descriptor file that passed parsing and name validation.
 * `fields.name` is always set, defaulted from the file name when absent.
 */
export type ParsedDescriptorFile = {
  name: string;
  filePath: string;
  fields: DescriptorFields;
};

export function defaultShortHelp(name: string): string {
  return `A rez plugin - ${name}.`;
}

export function pluginNameFromPath(filePath: string, extension: string): string {
  const base = path.basename(filePath);
  return base.endsWith(extension) ? base.slice(0, base.length - extension.length) : base;
}

export function isValidPluginName(name: string): boolean {
  return PLUGIN_NAME_PATTERN.test(name);
}

export function readDescriptorFile(
  filePath: string,
  extension: string
): ParsedDescriptorFile {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new DescriptorReadError(filePath, error);
  }
  return parseDescriptorSource(raw, filePath, extension);
}

export function parseDescriptorSource(
  raw: string,
  filePath: string,
  extension: string
): ParsedDescriptorFile {
  let data: unknown;
  try {
    data = parseYaml(raw);
  } catch (error) {
    throw new DescriptorParseError(filePath, error);
  }

  if (data === null || typeof data !== "object" || Array.isArray(data)) {
    throw new DescriptorValidationError(filePath, "expected a mapping of fields");
  }

  const parsed = descriptorFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new DescriptorValidationError(filePath, issues);
  }

  const name = parsed.data.name ?? pluginNameFromPath(filePath, extension);
  if (!isValidPluginName(name)) {
    throw new DescriptorValidationError(
      filePath,
      `plugin name '${name}' does not match ${PLUGIN_NAME_PATTERN.source}`
    );
  }

  return { name, filePath, fields: { ...parsed.data, name } };
}

export function finalizeDescriptor(file: ParsedDescriptorFile): PluginDescriptor {
  const { fields, filePath, name } = file;

  if (fields.command === undefined || fields.command.trim().length === 0) {
    throw new DescriptorValidationError(filePath, "plugin command is required");
  }
  if (fields.requires === undefined || fields.requires.length === 0) {
    throw new DescriptorValidationError(
      filePath,
      "plugin must specify at least one required package"
    );
  }

  return Object.freeze({
    name,
    command: fields.command,
    requires: Object.freeze([...fields.requires]),
    inheritsFrom: fields.inherits_from,
    shortHelp: fields.short_help ?? defaultShortHelp(name),
    runDetached: fields.run_detached ?? false,
    rezOpts: Object.freeze({ ...(fields.rez_opts ?? {}) }),
    filePath
  });
}

export function descriptorToRecord(
  descriptor: PluginDescriptor
): Record<string, unknown> {
  const record: Record<string, unknown> = {
    name: descriptor.name,
    command: descriptor.command,
    requires: [...descriptor.requires],
    short_help: descriptor.shortHelp,
    run_detached: descriptor.runDetached,
    rez_opts: { ...descriptor.rezOpts }
  };
  if (descriptor.inheritsFrom !== undefined) {
    record.inherits_from = descriptor.inheritsFrom;
  }
  record.path = descriptor.filePath;
  return record;
}
