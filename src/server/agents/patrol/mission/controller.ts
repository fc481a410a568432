/**
 * Patrol mission controller
 * Plans the patrol, watches its execution, then sends the robot to the
 * waypoint picked by the selector feed. Failed plans are replanned against the
 * unchanged goal.
 */

import type { Logger } from "pino";
import type { LatestValue } from "@shared/utils/latest.js";
import { assertNever } from "@shared/utils/assert.js";
import { InvalidSelectorError, PatrolError, PlanNotFoundError, errorMessage } from "@shared/errors.js";
import type { KnowledgeStore } from "@server/world/knowledge/types.js";
import type { Plan, PlanningService } from "@server/world/planning/types.js";
import type { ActionExecutionInfo, ExecutionEngine, PlanResult } from "@server/world/execution/types.js";
import { createLogger } from "@server/world/logging/logger.js";
import {
  destinationGoal,
  patrolGoal,
  patrolledFacts,
  robotAt,
  seedKnowledge,
  selectDestination,
} from "./knowledge.js";
import type { MissionDefinition } from "./knowledge.js";
import type { MissionState, MissionStateKind } from "./state.js";

export interface MissionControllerOptions {
  mission: MissionDefinition;
  knowledge: KnowledgeStore;
  planning: PlanningService;
  engine: ExecutionEngine;
  selector: LatestValue<number>;
  logger?: Logger;
  onTransition?: (from: MissionStateKind, to: MissionStateKind) => void;
}

export function formatFeedback(feedback: ActionExecutionInfo[]): string {
  return feedback.map((info) => `[${info.action} ${Math.round(info.completion * 100)}%]`).join("");
}

export class MissionController {
  private state: MissionState = { kind: "starting" };
  private initialized = false;
  private readonly mission: MissionDefinition;
  private readonly knowledge: KnowledgeStore;
  private readonly planning: PlanningService;
  private readonly engine: ExecutionEngine;
  private readonly logger: Logger;

  constructor(private readonly options: MissionControllerOptions) {
    this.mission = options.mission;
    this.knowledge = options.knowledge;
    this.planning = options.planning;
    this.engine = options.engine;
    this.logger = options.logger ?? createLogger("Mission");
  }

  getState(): MissionState {
    return this.state;
  }

  /**
   * Seed instances, connectivity and the robot's start position
   */
  async init(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await seedKnowledge(this.knowledge, this.mission);
    this.initialized = true;
    this.logger.info(
      { waypoints: this.mission.waypoints.length, connections: this.mission.connections.length },
      "Knowledge initialized",
    );
  }

  async tick(): Promise<void> {
    const state = this.state;
    switch (state.kind) {
      case "starting":
        await this.tickStarting();
        return;
      case "patrolFinished":
        await this.tickPatrolFinished();
        return;
      case "goBack":
        await this.tickGoBack(state);
        return;
      default:
        return assertNever(state, "mission state");
    }
  }

  /**
   * Cancel whatever plan is running
   */
  stop(): void {
    if (this.engine.isExecuting()) {
      this.logger.info("Cancelling running plan");
      this.engine.cancelPlanExecution();
    }
  }

  private async tickStarting(): Promise<void> {
    await this.knowledge.setGoal(patrolGoal(this.mission));
    if (await this.planAndExecute("Could not find plan to reach goal")) {
      this.transition({ kind: "patrolFinished" });
    }
  }

  private async tickPatrolFinished(): Promise<void> {
    const result = this.pollExecution();
    if (!result) {
      return;
    }

    if (!result.success) {
      this.logFailures(result);
      await this.planAndExecute("Unsuccessful replan attempt to reach goal");
      return;
    }

    this.logger.info("Successful finished");
    for (const patrolled of patrolledFacts(this.mission)) {
      await this.knowledge.removePredicate(patrolled);
    }

    const value = this.options.selector.get();
    const destination = selectDestination(this.mission, value);
    if (destination) {
      await this.knowledge.setGoal(destinationGoal(this.mission, destination));
    } else {
      this.logInvalidSelector(value);
    }

    if (await this.planAndExecute("Could not find plan to reach goal")) {
      this.transition({ kind: "goBack", destination, completed: false });
    }
  }

  private async tickGoBack(state: Extract<MissionState, { kind: "goBack" }>): Promise<void> {
    if (state.completed) {
      return;
    }
    const result = this.pollExecution();
    if (!result) {
      return;
    }

    if (!result.success) {
      this.logFailures(result);
      await this.planAndExecute("Unsuccessful replan attempt to reach goal");
      return;
    }

    this.logger.info("Successful finished");
    if (state.destination) {
      await this.knowledge.removePredicate(robotAt(this.mission, state.destination));
    } else {
      this.logInvalidSelector(this.options.selector.get());
    }
    this.transition({ ...state, completed: true });
  }

  /**
   * Print progress and return the finished plan's result, if any
   */
  private pollExecution(): PlanResult | undefined {
    const feedback = this.engine.getFeedback();
    if (feedback.length > 0) {
      this.logger.info(formatFeedback(feedback));
    }
    if (this.engine.isExecuting()) {
      return undefined;
    }
    return this.engine.getResult();
  }

  /**
   * Plan against a fresh domain/problem snapshot and submit it.
   * Returns true when the engine accepted the plan.
   */
  private async planAndExecute(noPlanMessage: string): Promise<boolean> {
    if (this.engine.isExecuting()) {
      this.logger.warn("A plan is still executing, not submitting another");
      return false;
    }

    let plan: Plan | undefined;
    try {
      const domain = await this.planning.getDomain();
      const problem = await this.planning.getProblem();
      plan = await this.planning.getPlan(domain, problem);
    } catch (error) {
      const code = error instanceof PatrolError ? error.code : undefined;
      this.logger.error({ code }, `Planning failed: ${errorMessage(error)}`);
      return false;
    }

    if (!plan) {
      const error = new PlanNotFoundError((await this.knowledge.getGoal()) ?? "<none>", noPlanMessage);
      this.logger.warn({ code: error.code }, error.message);
      return false;
    }

    return this.engine.startPlanExecution(plan);
  }

  private logFailures(result: PlanResult): void {
    for (const action of result.actions) {
      if (action.status === "failed") {
        this.logger.warn(
          { code: "ACTION_EXECUTION_FAILURE" },
          `[${action.action}] finished with error: ${action.messageStatus}`,
        );
      }
    }
  }

  private logInvalidSelector(value: number | undefined): void {
    const error = new InvalidSelectorError(value);
    this.logger.warn({ code: error.code }, error.message);
  }

  private transition(next: MissionState): void {
    const from = this.state.kind;
    this.state = next;
    if (from !== next.kind) {
      this.logger.info(`State ${from} -> ${next.kind}`);
    }
    this.options.onTransition?.(from, next.kind);
  }
}
