import path from "node:path";
import resourceGraphPlugin from "../../extensions/resource-graph/index.js";
import type { Logger } from "../logging/index.js";
import type { CliRegistrar, StackplanPlugin } from "./types.js";

export const BUILTIN_PLUGINS: readonly StackplanPlugin[] = [resourceGraphPlugin];

export type CliRegistration = {
  pluginId: string;
  registrar: CliRegistrar;
  commands: string[];
};

export type PluginRegistry = {
  plugins: StackplanPlugin[];
  cliRegistrations: CliRegistration[];
};

/**
 * Run every plugin's `register` hook and collect what it registered.
 *
 * @throws Error if two plugins share an id or claim the same command.
 */
export function loadPlugins(params: {
  plugins?: readonly StackplanPlugin[];
  stateDir: string;
  logger: Logger;
}): PluginRegistry {
  const registry: PluginRegistry = { plugins: [], cliRegistrations: [] };
  const claimed = new Map<string, string>();

  for (const plugin of params.plugins ?? BUILTIN_PLUGINS) {
    if (registry.plugins.some((p) => p.id === plugin.id)) {
      throw new Error(`Duplicate plugin id "${plugin.id}"`);
    }
    registry.plugins.push(plugin);

    plugin.register({
      id: plugin.id,
      logger: params.logger.child(plugin.id),
      resolvePath: (input) => path.resolve(params.stateDir, input),
      registerCli: (registrar, opts) => {
        const commands = opts?.commands ?? [];
        for (const command of commands) {
          const owner = claimed.get(command);
          if (owner) {
            throw new Error(`Command "${command}" from plugin "${plugin.id}" is already registered by "${owner}"`);
          }
          claimed.set(command, plugin.id);
        }
        registry.cliRegistrations.push({ pluginId: plugin.id, registrar, commands });
      },
    });
    params.logger.debug(`Loaded plugin ${plugin.id}`);
  }

  return registry;
}
