/**
 * In-process plan execution engine.
 * Runs plan items one after another in start-time order, ticking the
 * registered executor of each item and collecting its feedback.
 */

import type { Logger } from "pino";
import { clamp } from "@shared/geometry/pose.js";
import { errorMessage } from "@shared/errors.js";
import type { KnowledgeStore } from "@server/world/knowledge/types.js";
import { parseFact } from "@server/world/knowledge/pddl.js";
import { createLogger } from "@server/world/logging/logger.js";
import type { Plan } from "@server/world/planning/types.js";
import { Ticker } from "@server/world/runtime/ticker.js";
import type { ActionRegistration, ActionRegistry } from "./registry.js";
import type {
  ActionExecutionInfo,
  ActionHost,
  ActionInvocation,
  ExecutionEngine,
  PlanResult,
} from "./types.js";

export interface PlanExecutorOptions {
  registry: ActionRegistry;
  /** Receives the declared effects of every action that succeeds */
  knowledge?: KnowledgeStore;
  logger?: Logger;
  /** When true nothing ticks on its own; call step() */
  manual?: boolean;
  now?: () => number;
}

interface Step {
  info: ActionExecutionInfo;
  invocation: ActionInvocation;
  registration: ActionRegistration;
}

interface ReportedResult {
  success: boolean;
  fraction: number;
  message: string;
}

interface Run {
  steps: Step[];
  index: number;
  ticker: Ticker | null;
  /** Result reported for the current step, read after its tick */
  reported: ReportedResult | null;
  host: ActionHost;
}

export class PlanExecutor implements ExecutionEngine {
  private run: Run | null = null;
  private result: PlanResult | undefined;
  private lastFeedback: ActionExecutionInfo[] = [];
  private readonly registry: ActionRegistry;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly options: PlanExecutorOptions) {
    this.registry = options.registry;
    this.logger = options.logger ?? createLogger("Executor");
    this.now = options.now ?? Date.now;
  }

  startPlanExecution(plan: Plan): boolean {
    if (this.run) {
      this.logger.warn("Plan already executing, refusing a second one");
      return false;
    }
    if (plan.items.length === 0) {
      this.logger.warn("Refusing an empty plan");
      return false;
    }

    const steps: Step[] = [];
    const ordered = [...plan.items].sort((a, b) => a.time - b.time);
    for (const item of ordered) {
      let name: string;
      let args: string[];
      try {
        const parsed = parseFact(item.action);
        name = parsed.name;
        args = parsed.args;
      } catch (error) {
        this.logger.error({ action: item.action }, `Cannot parse plan action: ${errorMessage(error)}`);
        return false;
      }

      const registration = this.registry.get(name);
      if (!registration) {
        this.logger.error({ action: item.action }, `No executor registered for "${name}"`);
        return false;
      }

      steps.push({
        info: {
          action: item.action,
          actionName: name,
          arguments: args,
          status: "pending",
          completion: 0,
          messageStatus: "",
        },
        invocation: Object.freeze({ action: item.action, actionName: name, arguments: Object.freeze([...args]) }),
        registration,
      });
    }

    this.result = undefined;
    const run: Run = { steps, index: 0, ticker: null, reported: null, host: this.createHost(steps[0]) };
    this.run = run;
    this.lastFeedback = steps.map((step) => step.info);
    this.logger.info({ actions: steps.length }, "Plan execution started");
    this.beginStep(run);
    return true;
  }

  isExecuting(): boolean {
    return this.run !== null;
  }

  getFeedback(): ActionExecutionInfo[] {
    return this.lastFeedback.map((info) => ({ ...info, arguments: [...info.arguments] }));
  }

  getResult(): PlanResult | undefined {
    return this.result;
  }

  cancelPlanExecution(): void {
    const run = this.run;
    if (!run) {
      return;
    }
    run.ticker?.stop();
    const current = run.steps[run.index];
    if (current?.info.status === "executing") {
      current.registration.executor.cancel();
    }
    for (const step of run.steps) {
      if (step.info.status === "pending" || step.info.status === "executing") {
        step.info.status = "cancelled";
        step.info.finishedAt = this.now();
      }
    }
    this.finish(run, false, "Plan execution cancelled");
  }

  /**
   * Tick the current action once
   */
  async step(): Promise<void> {
    const run = this.run;
    if (!run) {
      return;
    }
    const current = run.steps[run.index];

    try {
      await current.registration.executor.tick(current.invocation, run.host);
    } catch (error) {
      current.registration.executor.cancel();
      run.reported = { success: false, fraction: current.info.completion, message: errorMessage(error) };
    }

    // Cancelled while the tick was in flight
    if (this.run !== run) {
      return;
    }

    const reported = run.reported;
    if (!reported) {
      return;
    }
    run.reported = null;
    current.info.completion = clamp(reported.fraction, 0, 1);
    current.info.messageStatus = reported.message;
    current.info.finishedAt = this.now();

    if (!reported.success) {
      current.info.status = "failed";
      this.logger.warn({ action: current.info.action }, `Action failed: ${reported.message}`);
      this.finish(run, false, `${current.info.action} failed: ${reported.message}`);
      return;
    }

    current.info.status = "succeeded";
    await this.applyEffects(current);
    if (this.run !== run) {
      return;
    }

    run.ticker?.stop();
    run.ticker = null;
    run.index += 1;
    if (run.index >= run.steps.length) {
      this.finish(run, true, "Plan completed");
      return;
    }
    run.host = this.createHost(run.steps[run.index]);
    this.beginStep(run);
  }

  private beginStep(run: Run): void {
    const current = run.steps[run.index];
    current.info.status = "executing";
    current.info.startedAt = this.now();
    this.logger.info({ action: current.info.action }, "Action started");

    if (this.options.manual) {
      return;
    }
    run.ticker = new Ticker(() => this.step(), {
      name: current.info.actionName,
      intervalMs: current.registration.intervalMs,
      logger: this.logger,
    });
    run.ticker.start();
  }

  private createHost(step: Step): ActionHost {
    const isCurrent = (): boolean => {
      const run = this.run;
      return run !== null && run.steps[run.index] === step;
    };
    return {
      reportFeedback: (fraction, message) => {
        if (!isCurrent() || step.info.status !== "executing") {
          return;
        }
        step.info.completion = clamp(fraction, 0, 1);
        step.info.messageStatus = message;
      },
      reportResult: (success, fraction, message) => {
        const run = this.run;
        if (!run || !isCurrent() || step.info.status !== "executing") {
          return;
        }
        run.reported = { success, fraction, message };
      },
    };
  }

  private async applyEffects(step: Step): Promise<void> {
    const knowledge = this.options.knowledge;
    const effectsFn = step.registration.effects;
    if (!knowledge || !effectsFn) {
      return;
    }
    const effects = effectsFn(step.info.arguments);
    try {
      for (const fact of effects.remove ?? []) {
        await knowledge.removePredicate(fact);
      }
      for (const fact of effects.add ?? []) {
        await knowledge.addPredicate(fact);
      }
    } catch (error) {
      this.logger.error({ action: step.info.action }, `Failed to apply effects: ${errorMessage(error)}`);
    }
  }

  private finish(run: Run, success: boolean, message: string): void {
    run.ticker?.stop();
    run.ticker = null;
    this.run = null;
    this.lastFeedback = run.steps.map((step) => step.info);
    this.result = {
      success,
      message,
      actions: run.steps.map((step) => ({ ...step.info, arguments: [...step.info.arguments] })),
    };
    this.logger.info({ success }, message);
  }
}
