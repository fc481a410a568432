/**
 * Planning service backed by an external POPF-compatible solver.
 * The solver binary is an external collaborator; this module only writes its
 * input files, runs it and reads the plan back.
 */

import { execFile } from "node:child_process";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Logger } from "pino";
import { ServiceUnavailableError, errorMessage } from "@shared/errors.js";
import type { KnowledgeStore } from "@server/world/knowledge/types.js";
import { createLogger } from "@server/world/logging/logger.js";
import type { Plan, PlanItem, PlanSolver, PlanningService } from "./types.js";

const PLAN_LINE = /^\s*(\d+(?:\.\d+)?)\s*:\s*(\([^()]*\))\s*\[\s*(\d+(?:\.\d+)?)\s*\]/;
const SOLUTION_MARKER = /^;+\s*Solution Found/i;

/**
 * Extract plan lines ("0.000: (move r2d2 wp1 wp2)  [5.000]") from solver output.
 * When the solver printed several solutions only the last one is kept.
 */
export function parsePlan(output: string): Plan | undefined {
  let items: PlanItem[] = [];
  for (const line of output.split(/\r?\n/)) {
    if (SOLUTION_MARKER.test(line)) {
      items = [];
      continue;
    }
    const match = PLAN_LINE.exec(line);
    if (match) {
      items.push({
        time: Number(match[1]),
        action: match[2].replace(/\s+/g, " ").toLowerCase(),
        duration: Number(match[3]),
      });
    }
  }
  return items.length > 0 ? { items } : undefined;
}

export function formatPlan(plan: Plan): string {
  return plan.items
    .map((item) => `${item.time.toFixed(3)}: ${item.action} [${item.duration.toFixed(3)}]`)
    .join("\n");
}

export interface ProcessSolverOptions {
  command: string;
  args?: string[];
  timeoutMs?: number;
}

/**
 * Runs `<command> ...args <domain> <problem>` and returns stdout
 */
export class ProcessPlanSolver implements PlanSolver {
  constructor(private readonly options: ProcessSolverOptions) {}

  solve(domainFile: string, problemFile: string): Promise<string> {
    const args = [...(this.options.args ?? []), domainFile, problemFile];
    return new Promise((resolve, reject) => {
      execFile(
        this.options.command,
        args,
        { encoding: "utf8", timeout: this.options.timeoutMs ?? 15000, maxBuffer: 10 * 1024 * 1024 },
        (error, stdout) => {
          if (!error) {
            resolve(stdout);
            return;
          }
          // Non-zero exit still carries whatever the solver printed
          if (typeof error.code === "number" && !error.killed) {
            resolve(stdout);
            return;
          }
          reject(new ServiceUnavailableError("planner", `Planner "${this.options.command}" failed: ${error.message}`, { cause: error }));
        },
      );
    });
  }
}

export interface PopfPlanningServiceOptions {
  domainFile: string;
  knowledge: KnowledgeStore;
  solver: PlanSolver;
  logger?: Logger;
}

export class PopfPlanningService implements PlanningService {
  private domainCache: string | undefined;
  private readonly logger: Logger;

  constructor(private readonly options: PopfPlanningServiceOptions) {
    this.logger = options.logger ?? createLogger("Planner");
  }

  async getDomain(): Promise<string> {
    if (this.domainCache === undefined) {
      try {
        this.domainCache = await readFile(this.options.domainFile, "utf-8");
      } catch (error) {
        throw new ServiceUnavailableError(
          "domain",
          `Cannot read domain ${this.options.domainFile}: ${errorMessage(error)}`,
          { cause: error },
        );
      }
    }
    return this.domainCache;
  }

  getProblem(): Promise<string> {
    return this.options.knowledge.getProblem();
  }

  async getPlan(domain: string, problem: string): Promise<Plan | undefined> {
    const workDir = await mkdtemp(join(tmpdir(), "patrol-plan-"));
    try {
      const domainFile = join(workDir, "domain.pddl");
      const problemFile = join(workDir, "problem.pddl");
      await writeFile(domainFile, domain, "utf-8");
      await writeFile(problemFile, problem, "utf-8");

      const output = await this.options.solver.solve(domainFile, problemFile);
      const plan = parsePlan(output);
      if (plan) {
        this.logger.debug({ actions: plan.items.length }, "Plan computed");
      }
      return plan;
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}
