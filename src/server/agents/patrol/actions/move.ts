/**
 * Move action: turns "(move ?r ?from ?to)" into a navigation goal and watches
 * the robot's pose until it is close enough to the target.
 */

import type { Logger } from "pino";
import { ORIGIN_POSE, formatPose, planarDistance, progressFraction } from "@shared/geometry/pose.js";
import type { Pose } from "@shared/geometry/pose.js";
import { LatestValue } from "@shared/utils/latest.js";
import { waitUntilReady } from "@shared/utils/retry.js";
import { assertNever } from "@shared/utils/assert.js";
import { MissingWaypointError, errorMessage } from "@shared/errors.js";
import type { ActionExecutor, ActionHost, ActionInvocation } from "@server/world/execution/types.js";
import type { MotionResult, MotionService } from "@server/world/motion/types.js";
import type { Waypoint, WaypointTable } from "@server/world/waypoints/table.js";
import { createLogger } from "@server/world/logging/logger.js";

export interface MoveGoal {
  target: Waypoint;
  /** Distance to the target when the goal was submitted */
  initialDistance: number;
}

export type MoveState =
  | { kind: "idle" }
  | { kind: "awaitingServer"; target: Waypoint; abort: AbortController }
  | { kind: "navigating"; goal: MoveGoal; abort: AbortController }
  | { kind: "reached"; goal: MoveGoal };

export type MoveStateKind = MoveState["kind"];

type AwaitingServer = Extract<MoveState, { kind: "awaitingServer" }>;

export interface MoveActionOptions {
  waypoints: WaypointTable;
  motion: MotionService;
  /** Planar distance below which the target counts as reached */
  reachedThreshold?: number;
  serverWaitTimeoutMs?: number;
  serverWaitAttempts?: number;
  /** Fail when no pose arrives for this long while navigating; 0 disables */
  poseTimeoutMs?: number;
  logger?: Logger;
  now?: () => number;
  onTransition?: (from: MoveStateKind, to: MoveStateKind) => void;
}

/** Position of the destination in "(move ?r ?from ?to)" */
const DESTINATION_ARG = 2;

export class MoveAction implements ActionExecutor {
  readonly kind = "move";
  private state: MoveState = { kind: "idle" };
  private readonly pose: LatestValue<Pose>;
  private fraction = 0;
  private motionResult: MotionResult | undefined;
  private submittedAt = 0;
  /** Bumped on every submit and reset so late motion callbacks are dropped */
  private generation = 0;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly reachedThreshold: number;
  private readonly poseTimeoutMs: number;

  constructor(private readonly options: MoveActionOptions) {
    this.logger = options.logger ?? createLogger("Move");
    this.now = options.now ?? Date.now;
    this.pose = new LatestValue<Pose>(this.now);
    this.reachedThreshold = options.reachedThreshold ?? 0.3;
    this.poseTimeoutMs = options.poseTimeoutMs ?? 0;
  }

  getState(): MoveStateKind {
    return this.state.kind;
  }

  onPoseUpdate(pose: Pose): void {
    this.pose.set(pose);
  }

  async tick(invocation: ActionInvocation, host: ActionHost): Promise<void> {
    const state = this.state;
    switch (state.kind) {
      case "idle":
        await this.start(invocation, host);
        return;
      case "awaitingServer":
        await this.connectAndSubmit(state, host);
        return;
      case "navigating":
        this.monitor(state, host);
        return;
      case "reached":
        this.logger.info("Goal reached!");
        this.transition({ kind: "idle" });
        this.reset();
        host.reportResult(true, 1.0, "Move completed");
        return;
      default:
        return assertNever(state, "move state");
    }
  }

  cancel(): void {
    if (this.state.kind === "awaitingServer" || this.state.kind === "navigating") {
      this.state.abort.abort();
    }
    if (this.state.kind !== "idle") {
      this.transition({ kind: "idle" });
    }
    this.reset();
  }

  private async start(invocation: ActionInvocation, host: ActionHost): Promise<void> {
    host.reportFeedback(0.0, "Move starting");

    const destination = invocation.arguments[DESTINATION_ARG];
    let target: Waypoint;
    try {
      if (destination === undefined) {
        throw new MissingWaypointError("<none>");
      }
      target = this.options.waypoints.get(destination);
    } catch (error) {
      this.logger.error({ action: invocation.action }, errorMessage(error));
      host.reportResult(false, 0, errorMessage(error));
      return;
    }

    const awaiting: AwaitingServer = { kind: "awaitingServer", target, abort: new AbortController() };
    this.transition(awaiting);
    await this.connectAndSubmit(awaiting, host);
  }

  private async connectAndSubmit(awaiting: AwaitingServer, host: ActionHost): Promise<void> {
    const { target, abort } = awaiting;
    try {
      await waitUntilReady((timeoutMs, signal) => this.options.motion.waitForServer(timeoutMs, signal), {
        label: "navigation",
        attempts: this.options.serverWaitAttempts ?? 12,
        timeoutMs: this.options.serverWaitTimeoutMs ?? 5000,
        signal: abort.signal,
        onRetry: (attempt, attempts) => {
          this.logger.info(`Waiting for navigation action server... (${attempt}/${attempts})`);
        },
      });
    } catch (error) {
      if (this.state !== awaiting) {
        this.logger.info(`Navigation to [${target.id}] cancelled before the goal was sent`);
        return;
      }
      this.logger.error(errorMessage(error));
      this.transition({ kind: "idle" });
      this.reset();
      host.reportResult(false, 0, errorMessage(error));
      return;
    }
    if (this.state !== awaiting) {
      this.logger.info(`Navigation to [${target.id}] cancelled before the goal was sent`);
      return;
    }
    this.logger.info("Navigation action server ready");
    this.logger.info(`Start navigation to [${target.id}]`);

    const current = this.pose.get() ?? ORIGIN_POSE;
    const goal: MoveGoal = { target, initialDistance: planarDistance(target.pose, current) };
    this.reset();
    const generation = this.generation;

    const handle = this.options.motion.submitGoal(target.pose, {
      signal: abort.signal,
      onFeedback: (remaining) => {
        if (generation !== this.generation) {
          return;
        }
        this.fraction = progressFraction(remaining, goal.initialDistance);
        host.reportFeedback(this.fraction, "Move running");
      },
    });
    void handle.result.then((result) => {
      if (generation === this.generation) {
        this.motionResult = result;
      }
    });

    this.logger.info("Goal sent to navigation action server");
    this.transition({ kind: "navigating", goal, abort });
  }

  private monitor(state: Extract<MoveState, { kind: "navigating" }>, host: ActionHost): void {
    const failure = this.motionFailure() ?? this.poseSilence();
    if (failure) {
      this.logger.error(failure);
      state.abort.abort();
      const fraction = this.fraction;
      this.transition({ kind: "idle" });
      this.reset();
      host.reportResult(false, fraction, failure);
      return;
    }

    const current = this.pose.get() ?? ORIGIN_POSE;
    const distance = planarDistance(state.goal.target.pose, current);
    this.logger.debug(`Reaching goal, distance: ${distance.toFixed(3)} at ${formatPose(current)}`);

    if (distance < this.reachedThreshold) {
      this.transition({ kind: "reached", goal: state.goal });
      return;
    }
    host.reportFeedback(this.fraction, "Move running");
  }

  private motionFailure(): string | undefined {
    const result = this.motionResult;
    if (!result || result.outcome === "succeeded") {
      return undefined;
    }
    return result.message ?? `Navigation ${result.outcome}`;
  }

  private poseSilence(): string | undefined {
    if (this.poseTimeoutMs <= 0) {
      return undefined;
    }
    const lastSeen = Math.max(this.pose.snapshot()?.receivedAt ?? 0, this.submittedAt);
    if (this.now() - lastSeen <= this.poseTimeoutMs) {
      return undefined;
    }
    return `No pose received for more than ${this.poseTimeoutMs}ms`;
  }

  private transition(next: MoveState): void {
    const from = this.state.kind;
    if (next.kind === "navigating") {
      this.submittedAt = this.now();
    }
    this.state = next;
    this.options.onTransition?.(from, next.kind);
  }

  private reset(): void {
    this.generation += 1;
    this.fraction = 0;
    this.motionResult = undefined;
  }
}
