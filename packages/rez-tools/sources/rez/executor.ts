import { once } from "node:events";

import { execa, ExecaError } from "execa";

import { ResolverSpawnError } from "../errors.js";
import { getLogger } from "../log.js";
import type { AssembledCommand } from "./assemble.js";

const logger = getLogger("rez.executor");

export type ExecuteOptions = {
  detached: boolean;
};

export type CommandExecutor = (
  command: AssembledCommand,
  options: ExecuteOptions
) => Promise<number>;

/**
 * Runs an assembled resolver invocation.
 *
 * Attached runs resolve with the child's exit code. Detached runs resolve with
 * 0 as soon as the child has been spawned; its own exit status is not reported.
 * Either way a child that cannot be spawned raises {@link ResolverSpawnError}.
 */
export const executeCommand: CommandExecutor = async (command, options) => {
  logger.info(
    { commandLine: command.commandLine, detached: options.detached },
    "Executing rez command"
  );
  return options.detached ? executeDetached(command) : executeAttached(command);
};

async function executeAttached(command: AssembledCommand): Promise<number> {
  const result = await execa(command.file, command.args, {
    stdio: "inherit",
    reject: false
  });

  if (result.exitCode !== undefined) {
    logger.debug({ exitCode: result.exitCode }, "Process exited");
    return result.exitCode;
  }
  if (result.signal) {
    logger.warn({ signal: result.signal }, "Process was terminated by a signal");
    return 1;
  }
  throw new ResolverSpawnError(command.file, spawnFailureCause(result));
}

async function executeDetached(command: AssembledCommand): Promise<number> {
  const subprocess = execa(command.file, command.args, {
    detached: true,
    stdio: "ignore",
    cleanup: false,
    reject: false,
    windowsHide: false
  });

  void subprocess.then((result) => {
    logger.debug(
      { exitCode: result.exitCode, failed: result.failed },
      "Detached process finished"
    );
  });

  try {
    await once(subprocess, "spawn");
  } catch (error) {
    throw new ResolverSpawnError(command.file, error);
  }

  subprocess.unref();
  logger.info({ pid: subprocess.pid }, "Process started in detached mode");
  return 0;
}

function spawnFailureCause(result: object): unknown {
  if (result instanceof ExecaError) {
    return result.cause ?? result.shortMessage;
  }
  return "process exited without a status";
}
