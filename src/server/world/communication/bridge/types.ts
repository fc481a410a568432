export type MessageHandler = (msg: unknown) => void;

export interface ServiceCallOptions {
  type?: string;
  timeoutMs?: number;
  /** Aborting rejects the call and drops its pending response */
  signal?: AbortSignal;
}

export interface ActionGoalOptions {
  onFeedback?: (values: unknown) => void;
  signal?: AbortSignal;
}

export interface ActionGoalResult {
  /** action_msgs/GoalStatus code */
  status: number | undefined;
  result: boolean;
  values: unknown;
}

export interface BridgeActionGoal {
  readonly id: string;
  readonly result: Promise<ActionGoalResult>;
  cancel(): void;
}

/**
 * What the rest of the runtime needs from the robot middleware bridge
 */
export interface BridgeTransport {
  isConnected(): boolean;
  /** Returns an unsubscribe function */
  subscribe(topic: string, type: string, handler: MessageHandler): () => void;
  publish(topic: string, type: string, msg: unknown): void;
  callService(service: string, args?: unknown, options?: ServiceCallOptions): Promise<unknown>;
  sendActionGoal(action: string, actionType: string, args: unknown, options?: ActionGoalOptions): BridgeActionGoal;
}

/** action_msgs/msg/GoalStatus */
export const GoalStatus = {
  UNKNOWN: 0,
  ACCEPTED: 1,
  EXECUTING: 2,
  CANCELING: 3,
  SUCCEEDED: 4,
  CANCELED: 5,
  ABORTED: 6,
} as const;
