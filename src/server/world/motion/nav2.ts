/**
 * Motion service client for the Nav2 `navigate_to_pose` action, reached
 * through the rosbridge transport.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import type { Logger } from "pino";
import type { Pose } from "@shared/geometry/pose.js";
import { errorMessage } from "@shared/errors.js";
import type { BridgeTransport } from "@server/world/communication/bridge/types.js";
import { GoalStatus } from "@server/world/communication/bridge/types.js";
import { createLogger } from "@server/world/logging/logger.js";
import type { MotionGoalHandle, MotionGoalOptions, MotionResult, MotionService, VelocityPublisher } from "./types.js";

const feedbackSchema = z.object({
  distance_remaining: z.number(),
});

const actionServersSchema = z.object({
  action_servers: z.array(z.string()),
});

const CONNECTION_POLL_MS = 100;

export interface Nav2MotionServiceOptions {
  action?: string;
  actionType?: string;
  frameId?: string;
  /** rosapi service listing the live action servers */
  actionServersService?: string;
  logger?: Logger;
  now?: () => number;
}

function stripSlash(name: string): string {
  return name.startsWith("/") ? name.slice(1) : name;
}

export function toStamp(ms: number): { sec: number; nanosec: number } {
  const sec = Math.floor(ms / 1000);
  return { sec, nanosec: Math.round((ms - sec * 1000) * 1e6) };
}

export class Nav2MotionService implements MotionService {
  private readonly action: string;
  private readonly actionType: string;
  private readonly frameId: string;
  private readonly actionServersService: string;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly bridge: BridgeTransport, options: Nav2MotionServiceOptions = {}) {
    this.action = options.action ?? "/navigate_to_pose";
    this.actionType = options.actionType ?? "nav2_msgs/action/NavigateToPose";
    this.frameId = options.frameId ?? "map";
    this.actionServersService = options.actionServersService ?? "/rosapi/action_servers";
    this.logger = options.logger ?? createLogger("Nav2");
    this.now = options.now ?? Date.now;
  }

  /**
   * True once the bridge is up and the navigation action server is listed.
   * Gives up after `timeoutMs` or as soon as `signal` aborts.
   */
  async waitForServer(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    const deadline = this.now() + timeoutMs;
    try {
      while (!this.bridge.isConnected()) {
        const left = deadline - this.now();
        if (left <= 0 || signal?.aborted) {
          return false;
        }
        await sleep(Math.min(CONNECTION_POLL_MS, left), undefined, { signal });
      }
    } catch (error) {
      this.logger.debug({ err: errorMessage(error) }, "Stopped waiting for the bridge");
      return false;
    }
    if (signal?.aborted) {
      return false;
    }

    const left = Math.max(1, deadline - this.now());
    try {
      const response = actionServersSchema.parse(
        await this.bridge.callService(this.actionServersService, {}, { timeoutMs: left, signal }),
      );
      const wanted = stripSlash(this.action);
      return response.action_servers.some((name) => stripSlash(name) === wanted);
    } catch (error) {
      this.logger.debug({ err: errorMessage(error) }, "Action server query failed");
      return false;
    }
  }

  submitGoal(target: Pose, options: MotionGoalOptions = {}): MotionGoalHandle {
    const goal = this.bridge.sendActionGoal(
      this.action,
      this.actionType,
      {
        pose: {
          header: { frame_id: this.frameId, stamp: toStamp(this.now()) },
          pose: target,
        },
        behavior_tree: "",
      },
      {
        signal: options.signal,
        onFeedback: (values) => {
          const feedback = feedbackSchema.safeParse(values);
          if (feedback.success) {
            options.onFeedback?.(feedback.data.distance_remaining);
          }
        },
      },
    );

    const result: Promise<MotionResult> = goal.result.then(
      (outcome): MotionResult => {
        switch (outcome.status) {
          case GoalStatus.SUCCEEDED:
            return { outcome: "succeeded" };
          case GoalStatus.CANCELED:
            return { outcome: "canceled" };
          case GoalStatus.ABORTED:
            return { outcome: "aborted", message: "Navigation aborted" };
          default:
            return outcome.result
              ? { outcome: "succeeded" }
              : { outcome: "rejected", message: "Navigation goal rejected" };
        }
      },
      (error: unknown): MotionResult => ({ outcome: "aborted", message: errorMessage(error) }),
    );

    return { result, cancel: () => goal.cancel() };
  }
}

/**
 * geometry_msgs/Twist publisher for turning in place
 */
export class BridgeVelocityPublisher implements VelocityPublisher {
  constructor(
    private readonly bridge: BridgeTransport,
    private readonly topic: string = "/cmd_vel",
  ) {}

  publish(linear: number, angular: number): void {
    this.bridge.publish(this.topic, "geometry_msgs/msg/Twist", {
      linear: { x: linear, y: 0, z: 0 },
      angular: { x: 0, y: 0, z: angular },
    });
  }
}
