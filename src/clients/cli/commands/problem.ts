import { Command } from "commander";
import { loadConfig } from "@server/world/config/index.js";
import type { PatrolConfig } from "@server/world/config/index.js";
import { InMemoryKnowledgeStore } from "@server/world/knowledge/store.js";
import { patrolGoal, seedKnowledge } from "@server/agents/patrol/mission/knowledge.js";
import { exitWithError } from "../utils/errors.js";

/**
 * Problem text the mission submits for its first plan
 */
export async function renderInitialProblem(config: PatrolConfig): Promise<string> {
  const store = new InMemoryKnowledgeStore();
  await seedKnowledge(store, config.mission);
  await store.setGoal(patrolGoal(config.mission));
  return store.getProblem();
}

export function createProblemCommand(): Command {
  return new Command("problem")
    .description("Print the initial patrol problem")
    .option("-c, --config <file>", "Config file (JSON)")
    .action(async (options: { config?: string }) => {
      try {
        const config = loadConfig({ path: options.config });
        process.stdout.write(await renderInitialProblem(config));
      } catch (error) {
        exitWithError(error);
      }
    });
}
