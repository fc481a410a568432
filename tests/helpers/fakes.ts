import type {
  ActionGoalOptions,
  ActionGoalResult,
  BridgeActionGoal,
  BridgeTransport,
  MessageHandler,
  ServiceCallOptions,
} from "@server/world/communication/bridge/types.js";
import type { ActionHost } from "@server/world/execution/types.js";
import type {
  MotionGoalHandle,
  MotionGoalOptions,
  MotionResult,
  MotionService,
  VelocityPublisher,
} from "@server/world/motion/types.js";
import type { Pose } from "@shared/geometry/pose.js";

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Let pending promise callbacks run */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export interface SentGoal {
  action: string;
  actionType: string;
  args: unknown;
  options: ActionGoalOptions;
  result: Deferred<ActionGoalResult>;
  cancelled: boolean;
}

/**
 * In-memory bridge: topics are fed by emit(), services answered by `respond`
 */
export class FakeBridge implements BridgeTransport {
  connected = true;
  readonly handlers = new Map<string, Set<MessageHandler>>();
  readonly published: Array<{ topic: string; type: string; msg: unknown }> = [];
  readonly serviceCalls: Array<{ service: string; args: unknown; options?: ServiceCallOptions }> = [];
  readonly goals: SentGoal[] = [];
  respond: (service: string, args: unknown) => Promise<unknown> = async () => ({});

  isConnected(): boolean {
    return this.connected;
  }

  subscribe(topic: string, _type: string, handler: MessageHandler): () => void {
    const set = this.handlers.get(topic) ?? new Set<MessageHandler>();
    set.add(handler);
    this.handlers.set(topic, set);
    return () => {
      set.delete(handler);
    };
  }

  emit(topic: string, msg: unknown): void {
    for (const handler of this.handlers.get(topic) ?? []) {
      handler(msg);
    }
  }

  subscriberCount(topic: string): number {
    return this.handlers.get(topic)?.size ?? 0;
  }

  publish(topic: string, type: string, msg: unknown): void {
    this.published.push({ topic, type, msg });
  }

  callService(service: string, args: unknown = {}, options?: ServiceCallOptions): Promise<unknown> {
    this.serviceCalls.push({ service, args, options });
    return this.respond(service, args);
  }

  sendActionGoal(action: string, actionType: string, args: unknown, options: ActionGoalOptions = {}): BridgeActionGoal {
    const goal: SentGoal = { action, actionType, args, options, result: deferred<ActionGoalResult>(), cancelled: false };
    this.goals.push(goal);
    options.signal?.addEventListener("abort", () => {
      goal.cancelled = true;
    });
    return {
      id: `send_action_goal:${action}:${this.goals.length}`,
      result: goal.result.promise,
      cancel: () => {
        goal.cancelled = true;
      },
    };
  }
}

export interface SubmittedMotionGoal {
  target: Pose;
  options: MotionGoalOptions;
  result: Deferred<MotionResult>;
  cancelled: boolean;
}

export class FakeMotion implements MotionService {
  ready = true;
  readonly waitCalls: number[] = [];
  readonly goals: SubmittedMotionGoal[] = [];
  onSubmit: ((target: Pose) => void) | undefined;
  /** When set, waitForServer resolves with this gate's value */
  gate: Deferred<boolean> | undefined;
  readonly waitSignals: Array<AbortSignal | undefined> = [];

  async waitForServer(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    this.waitCalls.push(timeoutMs);
    this.waitSignals.push(signal);
    if (this.gate) {
      return this.gate.promise;
    }
    return this.ready;
  }

  submitGoal(target: Pose, options: MotionGoalOptions = {}): MotionGoalHandle {
    const goal: SubmittedMotionGoal = { target, options, result: deferred<MotionResult>(), cancelled: false };
    this.goals.push(goal);
    options.signal?.addEventListener("abort", () => {
      goal.cancelled = true;
    });
    this.onSubmit?.(target);
    return {
      result: goal.result.promise,
      cancel: () => {
        goal.cancelled = true;
      },
    };
  }

  lastGoal(): SubmittedMotionGoal {
    const goal = this.goals[this.goals.length - 1];
    if (!goal) {
      throw new Error("No goal submitted");
    }
    return goal;
  }
}

export class RecordingVelocity implements VelocityPublisher {
  readonly commands: Array<[number, number]> = [];

  publish(linear: number, angular: number): void {
    this.commands.push([linear, angular]);
  }
}

export class RecordingHost implements ActionHost {
  readonly feedback: Array<[number, string]> = [];
  readonly results: Array<[boolean, number, string]> = [];

  reportFeedback(fraction: number, message: string): void {
    this.feedback.push([fraction, message]);
  }

  reportResult(success: boolean, fraction: number, message: string): void {
    this.results.push([success, fraction, message]);
  }
}
