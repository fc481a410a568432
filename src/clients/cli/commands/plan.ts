import { Command } from "commander";
import { loadConfig, resolveConfigPath } from "@server/world/config/index.js";
import { formatPlan, PopfPlanningService, ProcessPlanSolver } from "@server/world/planning/popf.js";
import { InMemoryKnowledgeStore } from "@server/world/knowledge/store.js";
import { patrolGoal, seedKnowledge } from "@server/agents/patrol/mission/knowledge.js";
import { PlanNotFoundError } from "@shared/errors.js";
import { outputJson, shouldOutputJson } from "../utils/json-output.js";
import { exitWithError } from "../utils/errors.js";

export function createPlanCommand(): Command {
  return new Command("plan")
    .description("Run the planner once on the initial patrol problem")
    .option("-c, --config <file>", "Config file (JSON)")
    .option("--json", "Output as JSON")
    .action(async (options: { config?: string; json?: boolean }) => {
      try {
        const config = loadConfig({ path: options.config });
        const knowledge = new InMemoryKnowledgeStore();
        await seedKnowledge(knowledge, config.mission);
        const goal = patrolGoal(config.mission);
        await knowledge.setGoal(goal);

        const planning = new PopfPlanningService({
          domainFile: resolveConfigPath(config.planner.domainFile),
          knowledge,
          solver: new ProcessPlanSolver(config.planner),
        });
        const plan = await planning.getPlan(await planning.getDomain(), await planning.getProblem());
        if (!plan) {
          throw new PlanNotFoundError(goal);
        }

        if (shouldOutputJson(options)) {
          outputJson(plan, options);
        } else {
          console.log(formatPlan(plan));
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}
