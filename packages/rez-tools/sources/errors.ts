export class RezToolsError extends Error {
  readonly exitCode: number;

  constructor(message: string, options: { exitCode?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.exitCode = options.exitCode ?? 1;
  }
}

export class ConfigError extends RezToolsError {}

export class DescriptorReadError extends RezToolsError {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(`Unable to read plugin ${filePath}: ${describeCause(cause)}`, { cause });
    this.filePath = filePath;
  }
}

export class DescriptorParseError extends RezToolsError {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(`Unable to parse plugin ${filePath}: ${describeCause(cause)}`, { cause });
    this.filePath = filePath;
  }
}

export class DescriptorValidationError extends RezToolsError {
  readonly filePath: string;

  constructor(filePath: string, reason: string) {
    super(`Unable to validate plugin ${filePath}: ${reason}`);
    this.filePath = filePath;
  }
}

export class InheritanceError extends RezToolsError {
  readonly filePath: string;

  constructor(filePath: string, reason: string) {
    super(`Unable to resolve inheritance for plugin ${filePath}: ${reason}`);
    this.filePath = filePath;
  }
}

export class CommandSynthesisError extends RezToolsError {
  readonly definition: unknown;

  constructor(name: string, reason: string, definition: unknown, cause?: unknown) {
    super(
      `Unable to build command ${name}: ${reason}\n` +
        JSON.stringify(definition, null, 2),
      { cause }
    );
    this.definition = definition;
  }
}

export class ResolverSpawnError extends RezToolsError {
  readonly file: string;

  constructor(file: string, cause: unknown) {
    super(`Failed to launch resolver ${file}: ${describeCause(cause)}`, {
      exitCode: 127,
      cause
    });
    this.file = file;
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
