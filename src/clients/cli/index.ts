#!/usr/bin/env node
import { Command } from "commander";
import { createRunCommand } from "./commands/run.js";
import { createWaypointsCommand } from "./commands/waypoints.js";
import { createProblemCommand } from "./commands/problem.js";
import { createPlanCommand } from "./commands/plan.js";
import { exitWithError } from "./utils/errors.js";

export function createProgram(): Command {
  return new Command("patrol")
    .description("Plan-driven robot patrol mission")
    .version("0.1.0")
    .addCommand(createRunCommand())
    .addCommand(createWaypointsCommand())
    .addCommand(createProblemCommand())
    .addCommand(createPlanCommand());
}

createProgram().parseAsync(process.argv).catch(exitWithError);
