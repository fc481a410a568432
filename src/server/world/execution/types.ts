import type { Pose } from "@shared/geometry/pose.js";
import type { Plan } from "@server/world/planning/types.js";

export interface ActionInvocation {
  /** Ground action text, e.g. "(move r2d2 wp1 wp2)" */
  readonly action: string;
  readonly actionName: string;
  readonly arguments: readonly string[];
}

/**
 * Sink the host hands to an executor on every tick
 */
export interface ActionHost {
  reportFeedback(fraction: number, message: string): void;
  reportResult(success: boolean, fraction: number, message: string): void;
}

/**
 * Capability implemented once per action kind and registered in the
 * action registry. One instance serves every invocation of its kind.
 */
export interface ActionExecutor {
  readonly kind: string;
  tick(invocation: ActionInvocation, host: ActionHost): Promise<void>;
  onPoseUpdate?(pose: Pose): void;
  /** The host discarded the current invocation */
  cancel(): void;
}

export interface ActionEffects {
  add?: string[];
  remove?: string[];
}

/** Knowledge changes applied when an invocation of the kind succeeds */
export type ActionEffectsFn = (args: readonly string[]) => ActionEffects;

export type ActionExecutionStatus = "pending" | "executing" | "succeeded" | "failed" | "cancelled";

export interface ActionExecutionInfo {
  action: string;
  actionName: string;
  arguments: string[];
  status: ActionExecutionStatus;
  /** 0..1 */
  completion: number;
  messageStatus: string;
  startedAt?: number;
  finishedAt?: number;
}

export interface PlanResult {
  success: boolean;
  message: string;
  actions: ActionExecutionInfo[];
}

export interface ExecutionEngine {
  /** False when a plan is already running or the plan cannot be dispatched */
  startPlanExecution(plan: Plan): boolean;
  isExecuting(): boolean;
  getFeedback(): ActionExecutionInfo[];
  /** Result of the last finished plan; undefined while running or before the first run */
  getResult(): PlanResult | undefined;
  cancelPlanExecution(): void;
}
