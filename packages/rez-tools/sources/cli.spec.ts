import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { describe, it, expect, afterEach, vi } from "vitest";

import { readGlobalFlags, runCli, type CliOptions } from "./cli.js";
import type { RezToolsConfig } from "./config.js";
import { ResolverSpawnError } from "./errors.js";
import { getLogger } from "./log.js";
import type { CommandExecutor } from "./rez/executor.js";

const tempRoots: string[] = [];

afterEach(async () => {
  await Promise.all(
    tempRoots.splice(0).map((root) => fs.rm(root, { recursive: true, force: true }))
  );
});

async function createToolDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "rt-cli-"));
  tempRoots.push(dir);
  await fs.writeFile(
    path.join(dir, "build.rt"),
    "command: python -c foo\nshort_help: Build things.\nrequires: [pkgA, pkgB]\n",
    "utf8"
  );
  await fs.writeFile(
    path.join(dir, "viewer.rt"),
    "command: viewer\nrequires: [viewer]\nrun_detached: true\n",
    "utf8"
  );
  return dir;
}

async function setup(execute: CommandExecutor = async () => 0) {
  const dir = await createToolDir();
  const config: RezToolsConfig = { toolPaths: [dir], extension: ".rt" };
  const stdout: string[] = [];
  const stderr: string[] = [];
  const executeSpy = vi.fn<CommandExecutor>(execute);
  const options: CliOptions = {
    env: { RT_LOG_LEVEL: "silent" },
    config,
    execute: executeSpy,
    stdout: (text) => stdout.push(text),
    stderr: (text) => stderr.push(text)
  };
  const run = (...args: string[]) => runCli(["node", "rt", ...args], options);
  return { dir, run, stdout, stderr, execute: executeSpy };
}

describe("runCli", () => {
  it("prints a plugin descriptor with --print", async () => {
    const { dir, run, stdout, execute } = await setup();

    const exitCode = await run("build", "--print");

    expect(exitCode).toBe(0);
    expect(execute).not.toHaveBeenCalled();
    expect(JSON.parse(stdout.join(""))).toEqual({
      name: "build",
      command: "python -c foo",
      requires: ["pkgA", "pkgB"],
      short_help: "Build things.",
      run_detached: false,
      rez_opts: {},
      path: path.join(dir, "build.rt")
    });
  });

  it("runs a plugin through rez and returns its exit code", async () => {
    const { run, execute } = await setup(async () => 3);

    const exitCode = await run("build");

    expect(exitCode).toBe(3);
    expect(execute).toHaveBeenCalledTimes(1);
    expect(execute.mock.calls[0]?.[0].tokens).toEqual([
      "rez",
      "env",
      "-q",
      "pkgA",
      "pkgB",
      "--",
      "python -c foo"
    ]);
  });

  it("replaces the command with --ignore-cmd", async () => {
    const { run, execute } = await setup();

    await run("build", "--ignore-cmd", "run.sh", "--flag");

    expect(execute.mock.calls[0]?.[0].commandLine).toBe(
      "rez env -q pkgA pkgB -- run.sh --flag"
    );
  });

  it("runs detached plugins in the background", async () => {
    const { run, execute } = await setup();

    await run("viewer");

    expect(execute.mock.calls[0]?.[1]).toEqual({ detached: true });
  });

  it("accepts global flags before the plugin name", async () => {
    const { run, stdout } = await setup();

    expect(await run("-q", "build", "--print")).toBe(0);
    expect(stdout.join("")).toContain("\"name\": \"build\"");
  });

  it("fails on an unknown plugin without running anything", async () => {
    const { run, stderr, execute } = await setup();

    const exitCode = await run("nope");

    expect(exitCode).toBe(1);
    expect(execute).not.toHaveBeenCalled();
    expect(stderr.join("")).toContain("unknown command 'nope'");
  });

  it("lists plugins", async () => {
    const { run, stdout } = await setup();

    expect(await run("ls")).toBe(0);
    expect(stdout.join("")).toBe(
      "Available plugins:\n" +
        "  build                Build things.\n" +
        "  viewer               A rez plugin - viewer.\n"
    );
  });

  it("shows help with plugin commands when called without arguments", async () => {
    const { run, stdout } = await setup();

    expect(await run()).toBe(0);
    const help = stdout.join("");
    expect(help).toContain("Usage: rt [options] PLUGIN [PLUGIN OPTIONS]");
    expect(help).toContain("  build                Build things.");
  });

  it("shows help when only global flags are given", async () => {
    const { run, stdout, stderr } = await setup();

    expect(await run("-q")).toBe(0);
    expect(stdout.join("")).toContain("Usage: rt [options] PLUGIN [PLUGIN OPTIONS]");
    expect(stderr).toEqual([]);
  });

  it("shows the options of a plugin with help <plugin>", async () => {
    const { run, stdout, stderr, execute } = await setup();

    expect(await run("help", "build")).toBe(0);
    const help = stdout.join("");
    expect(help).toContain("Usage: rt build [options] [args...]");
    expect(help).toContain("--force-rez-env-time <value>");
    expect(stderr).toEqual([]);
    expect(execute).not.toHaveBeenCalled();
  });

  it("takes the log level from the given environment", async () => {
    const { run } = await setup();
    const stdout: string[] = [];

    await runCli(["node", "rt", "ls"], {
      env: { RT_LOG_LEVEL: "info" },
      config: { toolPaths: [], extension: ".rt" },
      stdout: (text) => stdout.push(text)
    });
    expect(getLogger("cli").level).toBe("info");

    await run("ls");
    expect(getLogger("cli").level).toBe("silent");
  });

  it("prints the version", async () => {
    const { run, stdout } = await setup();

    expect(await run("--version")).toBe(0);
    expect(stdout).toEqual(["0.1.0\n"]);
  });

  it("exits with 127 when rez cannot be launched", async () => {
    const { run, stderr } = await setup(async () => {
      throw new ResolverSpawnError("rez", new Error("spawn rez ENOENT"));
    });

    expect(await run("build")).toBe(127);
    expect(stderr).toEqual(["Error: Failed to launch resolver rez: spawn rez ENOENT\n"]);
  });

  it("reports a missing config file", async () => {
    const stderr: string[] = [];

    const exitCode = await runCli(["node", "rt", "ls"], {
      env: {
        REZ_TOOL_CONFIG: "/nonexistent/rt-test/config.yaml",
        RT_LOG_LEVEL: "silent"
      },
      stdout: () => undefined,
      stderr: (text) => stderr.push(text)
    });

    expect(exitCode).toBe(1);
    expect(stderr).toEqual([
      "Error: Config file not found: /nonexistent/rt-test/config.yaml\n"
    ]);
  });
});

describe("readGlobalFlags", () => {
  it("finds the command asked about by help", () => {
    expect(readGlobalFlags(["help", "-v", "build"])).toEqual({
      verbose: false,
      quiet: false,
      commandName: "help",
      helpTarget: "build"
    });
  });

  it("stops at the first non-option argument", () => {
    expect(readGlobalFlags(["-v", "build", "-q"])).toEqual({
      verbose: true,
      quiet: false,
      commandName: "build"
    });
  });
});
