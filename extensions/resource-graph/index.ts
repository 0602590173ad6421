/**
 * Resource Graph: Plugin Entry Point
 */

import { HISTORY_FILENAME } from "../../src/config/paths.js";
import type { StackplanPlugin } from "../../src/plugins/types.js";
import { RESOURCE_GRAPH_COMMANDS, createResourceGraphCli } from "./src/cli.js";
import { InMemoryHistoryStorage, SQLiteHistoryStorage } from "./src/storage.js";

const plugin: StackplanPlugin = {
  id: "resource-graph",
  name: "Resource Graph Planner",
  register(api) {
    const useMemory = process.env.NODE_ENV === "test" || process.env.STACKPLAN_TEST === "1";

    const cli = createResourceGraphCli({
      openHistory: (env) => {
        if (useMemory) return new InMemoryHistoryStorage();
        const { path } = env.config.history;
        return new SQLiteHistoryStorage(path ? env.resolvePath(path) : api.resolvePath(HISTORY_FILENAME));
      },
    });
    api.registerCli(cli, { commands: RESOURCE_GRAPH_COMMANDS });
    api.logger.debug("Registered resource graph commands");
  },
};

export default plugin;
