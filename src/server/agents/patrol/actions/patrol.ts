import type { Logger } from "pino";
import type { ActionExecutor, ActionHost, ActionInvocation } from "@server/world/execution/types.js";
import type { VelocityPublisher } from "@server/world/motion/types.js";
import { createLogger } from "@server/world/logging/logger.js";

export interface PatrolActionOptions {
  velocity: VelocityPublisher;
  /** Progress added per tick */
  progressStep?: number;
  /** rad/s while turning in place */
  angularSpeed?: number;
  logger?: Logger;
}

/**
 * Patrol action: turns in place at the current waypoint until progress is full
 */
export class PatrolAction implements ActionExecutor {
  readonly kind = "patrol";
  private progress = 0;
  private readonly step: number;
  private readonly angularSpeed: number;
  private readonly logger: Logger;

  constructor(private readonly options: PatrolActionOptions) {
    this.step = options.progressStep ?? 0.1;
    this.angularSpeed = options.angularSpeed ?? 0.5;
    this.logger = options.logger ?? createLogger("Patrol");
  }

  getProgress(): number {
    return this.progress;
  }

  async tick(invocation: ActionInvocation, host: ActionHost): Promise<void> {
    if (this.progress === 0) {
      this.logger.info(`Patrolling ${invocation.arguments[1] ?? "?"}`);
    }

    if (this.progress < 1.0) {
      this.progress = Math.min(1.0, this.progress + this.step);
      host.reportFeedback(this.progress, "Patrol running");
      this.options.velocity.publish(0, this.angularSpeed);
      return;
    }

    this.options.velocity.publish(0, 0);
    this.progress = 0;
    host.reportResult(true, 1.0, "Patrol completed");
  }

  cancel(): void {
    if (this.progress > 0) {
      this.options.velocity.publish(0, 0);
    }
    this.progress = 0;
  }
}
