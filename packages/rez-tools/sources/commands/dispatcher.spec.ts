import { describe, it, expect, vi } from "vitest";

import { defaultConfig } from "../config.js";
import { CommandSynthesisError } from "../errors.js";
import type { PluginDescriptor } from "../plugins/descriptor.js";
import { PluginRegistry } from "../plugins/registry.js";
import { PluginDispatcher } from "./dispatcher.js";
import { listCommand } from "./list.js";

function descriptor(
  name: string,
  shortHelp = `A rez plugin - ${name}.`
): PluginDescriptor {
  return {
    name,
    command: "run",
    requires: ["pkg"],
    shortHelp,
    runDetached: false,
    rezOpts: {},
    filePath: `/tools/${name}.rt`
  };
}

function registryOf(descriptors: PluginDescriptor[]): PluginRegistry {
  return new PluginRegistry({
    config: defaultConfig("/home/test"),
    source: { discover: () => descriptors }
  });
}

function dispatcherFor(descriptors: PluginDescriptor[]): PluginDispatcher {
  return new PluginDispatcher({
    registry: registryOf(descriptors),
    handler: vi.fn(async () => 0),
    onExit: vi.fn()
  });
}

describe("PluginDispatcher", () => {
  it("synthesizes a command once, on first request", () => {
    const dispatcher = dispatcherFor([descriptor("alpha"), descriptor("beta")]);
    expect(dispatcher.listSynthesized()).toEqual([]);

    const first = dispatcher.getCommand("alpha");
    const second = dispatcher.getCommand("alpha");

    expect(first).not.toBeNull();
    expect(second).toBe(first);
    expect(dispatcher.listSynthesized()).toEqual(["alpha"]);
  });

  it("returns null for unknown plugins", () => {
    const dispatcher = dispatcherFor([descriptor("alpha")]);
    expect(dispatcher.getCommand("gamma")).toBeNull();
    expect(dispatcher.listSynthesized()).toEqual([]);
  });

  it("keeps synthesis failures to the plugin that caused them", () => {
    const dispatcher = dispatcherFor([descriptor("bad-name"), descriptor("good")]);

    expect(() => dispatcher.getCommand("bad-name")).toThrow(CommandSynthesisError);
    expect(dispatcher.getCommand("good")?.name()).toBe("good");
  });

  it("describes plugins in help without synthesizing them", () => {
    const dispatcher = dispatcherFor([
      descriptor("beta"),
      descriptor("alpha", "Alpha tool.")
    ]);

    const lines = dispatcher.formatPluginHelp().split("\n");

    expect(lines.slice(0, 4)).toEqual([
      "",
      "Plugin Commands:",
      "  alpha                Alpha tool.",
      "  beta                 A rez plugin - beta."
    ]);
    expect(lines).toContain("Plugin Options:");
    expect(lines).toContain(
      "  --force-rez-env-time <value>  Resolve packages as they were at the given time"
    );
    expect(dispatcher.listSynthesized()).toEqual([]);
  });
});

describe("listCommand", () => {
  it("prints every visible plugin with its short help", () => {
    const output: string[] = [];

    const registry = registryOf([descriptor("beta"), descriptor("alpha", "Alpha tool.")]);

    const exitCode = listCommand(registry, (text) => output.push(text));

    expect(exitCode).toBe(0);
    expect(output.join("")).toBe(
      "Available plugins:\n" +
        "  alpha                Alpha tool.\n" +
        "  beta                 A rez plugin - beta.\n"
    );
  });

  it("says so when there are no plugins", () => {
    const output: string[] = [];
    listCommand(registryOf([]), (text) => output.push(text));
    expect(output).toEqual(["No plugins found.\n"]);
  });
});
