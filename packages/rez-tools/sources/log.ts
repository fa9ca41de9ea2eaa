import pino, { type Logger } from "pino";

export type LoggingOptions = {
  verbose?: boolean;
  quiet?: boolean;
  env?: NodeJS.ProcessEnv;
};

const DEFAULT_LEVEL = "warn";
const LEVELS: readonly string[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent"
];

let rootLogger: Logger | null = null;
// Children copy the level they were created with, so each module's logger is
// kept here, one per name, and updated with the root.
const moduleLoggers = new Map<string, Logger>();

export function resolveLogLevel(
  options: LoggingOptions,
  env: NodeJS.ProcessEnv = options.env ?? process.env
): string {
  if (options.quiet) {
    return "error";
  }
  if (options.verbose) {
    return "debug";
  }
  const fromEnv = env.RT_LOG_LEVEL?.trim().toLowerCase();
  if (fromEnv && LEVELS.includes(fromEnv)) {
    return fromEnv;
  }
  return DEFAULT_LEVEL;
}

// Logs go to stderr synchronously: stdout carries command output only.
export function initLogging(options: LoggingOptions = {}): Logger {
  const level = resolveLogLevel(options);
  if (rootLogger) {
    rootLogger.level = level;
    for (const logger of moduleLoggers.values()) {
      logger.level = level;
    }
    return rootLogger;
  }
  rootLogger = pino({ name: "rt", level }, pino.destination({ dest: 2, sync: true }));
  return rootLogger;
}

export function getLogger(module: string): Logger {
  const existing = moduleLoggers.get(module);
  if (existing) {
    return existing;
  }
  const logger = (rootLogger ?? initLogging()).child({ module });
  moduleLoggers.set(module, logger);
  return logger;
}
