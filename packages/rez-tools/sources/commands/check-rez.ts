import { execa } from "execa";

import { getLogger } from "../log.js";
import type { ResolverLocation } from "../rez/resolver.js";

const logger = getLogger("command.check-rez");

export async function checkRezCommand(
  resolver: ResolverLocation,
  write: (text: string) => void
): Promise<number> {
  write(`Resolver: ${resolver.command} (from ${resolver.source})\n`);

  const result = await execa(resolver.command, ["--version"], { reject: false });
  if (result.exitCode === 0) {
    const version = result.stdout.trim();
    write(`Rez is installed${version ? `: ${version}` : ""}\n`);
    return 0;
  }

  logger.debug(
    { exitCode: result.exitCode, stderr: result.stderr },
    "Resolver version check failed"
  );
  write("Rez could not be run. Install rez or point REZ_PATH at its executable.\n");
  return 1;
}
