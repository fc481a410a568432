import type { Pose } from "@shared/geometry/pose.js";
import type { ActionEffectsFn, ActionExecutor } from "./types.js";

export interface ActionRegistration {
  executor: ActionExecutor;
  /** Tick period for invocations of this kind */
  intervalMs: number;
  effects?: ActionEffectsFn;
}

/**
 * Dispatch table from action kind to its executor
 */
export class ActionRegistry {
  private entries = new Map<string, ActionRegistration>();

  register(executor: ActionExecutor, options: { intervalMs: number; effects?: ActionEffectsFn }): void {
    if (this.entries.has(executor.kind)) {
      throw new Error(`Action "${executor.kind}" is already registered`);
    }
    this.entries.set(executor.kind, { executor, intervalMs: options.intervalMs, effects: options.effects });
  }

  get(kind: string): ActionRegistration | undefined {
    return this.entries.get(kind);
  }

  has(kind: string): boolean {
    return this.entries.has(kind);
  }

  kinds(): string[] {
    return Array.from(this.entries.keys());
  }

  list(): ActionRegistration[] {
    return Array.from(this.entries.values());
  }

  /**
   * Forward a pose sample to every executor that tracks position
   */
  broadcastPose(pose: Pose): void {
    for (const { executor } of this.entries.values()) {
      executor.onPoseUpdate?.(pose);
    }
  }

  clear(): void {
    this.entries.clear();
  }
}
