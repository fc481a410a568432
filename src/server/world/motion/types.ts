import type { Pose } from "@shared/geometry/pose.js";

export type MotionOutcome = "succeeded" | "aborted" | "canceled" | "rejected";

export interface MotionResult {
  outcome: MotionOutcome;
  message?: string;
}

export interface MotionGoalOptions {
  /** Remaining distance as reported by the motion stack */
  onFeedback?: (remainingDistance: number) => void;
  signal?: AbortSignal;
}

export interface MotionGoalHandle {
  /** Never rejects; transport failures resolve as "aborted" */
  readonly result: Promise<MotionResult>;
  cancel(): void;
}

export interface MotionService {
  /** Resolves false on timeout or once `signal` aborts */
  waitForServer(timeoutMs: number, signal?: AbortSignal): Promise<boolean>;
  submitGoal(target: Pose, options?: MotionGoalOptions): MotionGoalHandle;
}

export interface VelocityPublisher {
  publish(linear: number, angular: number): void;
}
