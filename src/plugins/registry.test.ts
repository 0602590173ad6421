import path from "node:path";
import { describe, expect, it } from "vitest";
import { RESOURCE_GRAPH_COMMANDS } from "../../extensions/resource-graph/src/cli.js";
import { createSilentLogger } from "../logging/index.js";
import { loadPlugins } from "./registry.js";
import type { StackplanPlugin, StackplanPluginApi } from "./types.js";

const logger = createSilentLogger("plugins");

function plugin(id: string, commands: string[], onRegister?: (api: StackplanPluginApi) => void): StackplanPlugin {
  return {
    id,
    name: id,
    register(api) {
      onRegister?.(api);
      api.registerCli(() => {}, { commands });
    },
  };
}

describe("loadPlugins", () => {
  it("loads the built-in resource graph plugin", () => {
    const registry = loadPlugins({ stateDir: "/state", logger });
    expect(registry.plugins.map((p) => p.id)).toEqual(["resource-graph"]);
    expect(registry.cliRegistrations.map((r) => [r.pluginId, r.commands])).toEqual([
      ["resource-graph", RESOURCE_GRAPH_COMMANDS],
    ]);
  });

  it("gives each plugin a scoped logger and state-relative paths", () => {
    const apis: StackplanPluginApi[] = [];
    loadPlugins({ plugins: [plugin("extra", [], (api) => apis.push(api))], stateDir: "/state", logger });

    expect(apis).toHaveLength(1);
    expect(apis[0].id).toBe("extra");
    expect(apis[0].logger.subsystem).toBe("plugins/extra");
    expect(apis[0].resolvePath("history.db")).toBe(path.resolve("/state", "history.db"));
  });

  it("rejects duplicate plugin ids", () => {
    expect(() =>
      loadPlugins({ plugins: [plugin("a", ["one"]), plugin("a", ["two"])], stateDir: "/state", logger }),
    ).toThrow('Duplicate plugin id "a"');
  });

  it("rejects two plugins claiming one command", () => {
    expect(() =>
      loadPlugins({ plugins: [plugin("a", ["plan"]), plugin("b", ["apply", "plan"])], stateDir: "/state", logger }),
    ).toThrow('Command "plan" from plugin "b" is already registered by "a"');
  });
});
