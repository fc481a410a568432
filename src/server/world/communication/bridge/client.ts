import WebSocket from "ws";
import type { Logger } from "pino";
import { BridgeError, CancelledError } from "@shared/errors.js";
import { createLogger } from "@server/world/logging/logger.js";
import { decodeFrame, encodeFrame } from "./protocol.js";
import type { IncomingFrame, OutgoingFrame } from "./protocol.js";
import type {
  ActionGoalOptions,
  ActionGoalResult,
  BridgeActionGoal,
  BridgeTransport,
  MessageHandler,
  ServiceCallOptions,
} from "./types.js";

enum ConnectionState {
  IDLE = "idle",
  CONNECTING = "connecting",
  CONNECTED = "connected",
  CLOSING = "closing",
}

export interface RosbridgeClientOptions {
  url: string;
  reconnectDelayMs?: number;
  requestTimeoutMs?: number;
  logger?: Logger;
}

interface Subscription {
  id: string;
  topic: string;
  type: string;
  handlers: Set<MessageHandler>;
}

interface PendingCall {
  resolve: (values: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

interface PendingGoal {
  action: string;
  onFeedback?: (values: unknown) => void;
  resolve: (result: ActionGoalResult) => void;
  reject: (error: Error) => void;
}

/**
 * WebSocket client for a rosbridge server.
 * Subscriptions and advertisements survive reconnects; in-flight service calls
 * and action goals are rejected when the socket drops.
 */
export class RosbridgeClient implements BridgeTransport {
  private socket: WebSocket | null = null;
  private state: ConnectionState = ConnectionState.IDLE;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private nextId = 0;
  private subscriptions = new Map<string, Subscription>();
  private advertised = new Map<string, string>();
  private pendingCalls = new Map<string, PendingCall>();
  private pendingGoals = new Map<string, PendingGoal>();
  private readonly logger: Logger;
  private readonly reconnectDelayMs: number;
  private readonly requestTimeoutMs: number;

  constructor(private readonly options: RosbridgeClientOptions) {
    this.logger = options.logger ?? createLogger("Bridge");
    this.reconnectDelayMs = options.reconnectDelayMs ?? 2000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 5000;
  }

  isConnected(): boolean {
    return this.state === ConnectionState.CONNECTED;
  }

  /**
   * Open the socket. Resolves once connected and rejects if the first attempt
   * fails; either way the client keeps reconnecting until close().
   */
  connect(): Promise<void> {
    if (this.state === ConnectionState.CONNECTED) {
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      this.open(resolve, reject);
    });
  }

  async close(): Promise<void> {
    this.state = ConnectionState.CLOSING;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    const socket = this.socket;
    this.socket = null;
    this.failPending(new BridgeError("Bridge closed"));

    if (socket && socket.readyState !== WebSocket.CLOSED) {
      await new Promise<void>((resolve) => {
        socket.once("close", () => resolve());
        socket.close();
      });
    }
    this.state = ConnectionState.IDLE;
  }

  subscribe(topic: string, type: string, handler: MessageHandler): () => void {
    let subscription = this.subscriptions.get(topic);
    if (!subscription) {
      subscription = { id: this.makeId("subscribe", topic), topic, type, handlers: new Set() };
      this.subscriptions.set(topic, subscription);
      this.send({ op: "subscribe", id: subscription.id, topic, type });
    }
    subscription.handlers.add(handler);

    const current = subscription;
    return () => {
      current.handlers.delete(handler);
      if (current.handlers.size === 0 && this.subscriptions.get(topic) === current) {
        this.subscriptions.delete(topic);
        this.send({ op: "unsubscribe", id: current.id, topic });
      }
    };
  }

  publish(topic: string, type: string, msg: unknown): void {
    if (!this.advertised.has(topic)) {
      this.advertised.set(topic, type);
      this.send({ op: "advertise", id: this.makeId("advertise", topic), topic, type });
    }
    if (!this.send({ op: "publish", topic, msg })) {
      this.logger.warn({ topic }, "Dropped message, bridge not connected");
    }
  }

  callService(service: string, args: unknown = {}, options: ServiceCallOptions = {}): Promise<unknown> {
    const id = this.makeId("call_service", service);
    const timeoutMs = options.timeoutMs ?? this.requestTimeoutMs;

    const signal = options.signal;

    return new Promise((resolve, reject) => {
      if (!this.isConnected()) {
        reject(new BridgeError(`Cannot call ${service}: bridge not connected`));
        return;
      }
      if (signal?.aborted) {
        reject(new CancelledError(`Service ${service}`));
        return;
      }

      const onAbort = (): void => {
        const pending = this.pendingCalls.get(id);
        if (pending) {
          this.pendingCalls.delete(id);
          clearTimeout(pending.timer);
          reject(new CancelledError(`Service ${service}`));
        }
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        this.pendingCalls.delete(id);
        reject(new BridgeError(`Service ${service} timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      this.pendingCalls.set(id, {
        resolve: (values) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(values);
        },
        reject: (error) => {
          signal?.removeEventListener("abort", onAbort);
          reject(error);
        },
        timer,
      });
      this.send({ op: "call_service", id, service, type: options.type, args });
    });
  }

  sendActionGoal(action: string, actionType: string, args: unknown, options: ActionGoalOptions = {}): BridgeActionGoal {
    const id = this.makeId("send_action_goal", action);

    const result = new Promise<ActionGoalResult>((resolve, reject) => {
      if (!this.isConnected()) {
        reject(new BridgeError(`Cannot send goal to ${action}: bridge not connected`));
        return;
      }
      this.pendingGoals.set(id, { action, onFeedback: options.onFeedback, resolve, reject });
      this.send({ op: "send_action_goal", id, action, action_type: actionType, args, feedback: true });
    });

    const cancel = (): void => {
      if (this.pendingGoals.has(id)) {
        this.send({ op: "cancel_action_goal", id, action });
      }
    };

    if (options.signal) {
      if (options.signal.aborted) {
        cancel();
      } else {
        options.signal.addEventListener("abort", cancel, { once: true });
      }
    }

    return { id, result, cancel };
  }

  private open(onOpen?: () => void, onFirstError?: (error: Error) => void): void {
    this.state = ConnectionState.CONNECTING;
    const socket = new WebSocket(this.options.url);
    this.socket = socket;

    socket.on("open", () => {
      if (this.socket !== socket) {
        return;
      }
      this.state = ConnectionState.CONNECTED;
      this.logger.info({ url: this.options.url }, "Connected");
      this.restoreSession();
      onOpen?.();
      onOpen = undefined;
      onFirstError = undefined;
    });

    socket.on("message", (data) => {
      const frame = decodeFrame(data.toString());
      if (!frame) {
        this.logger.warn("Ignored malformed frame");
        return;
      }
      this.dispatch(frame);
    });

    socket.on("error", (error) => {
      this.logger.error({ err: error }, "Socket error");
      if (onFirstError) {
        onFirstError(new BridgeError(`Cannot connect to ${this.options.url}: ${error.message}`, { cause: error }));
        onFirstError = undefined;
        onOpen = undefined;
      }
    });

    socket.on("close", () => {
      if (this.socket !== socket) {
        return;
      }
      this.socket = null;
      this.failPending(new BridgeError("Bridge connection closed"));

      if (this.state === ConnectionState.CLOSING) {
        return;
      }
      this.state = ConnectionState.IDLE;
      this.scheduleReconnect();
    });
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) {
      return;
    }
    this.logger.info({ delayMs: this.reconnectDelayMs }, "Reconnecting");
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.open();
    }, this.reconnectDelayMs);
  }

  private restoreSession(): void {
    for (const [topic, type] of this.advertised) {
      this.send({ op: "advertise", id: this.makeId("advertise", topic), topic, type });
    }
    for (const subscription of this.subscriptions.values()) {
      this.send({ op: "subscribe", id: subscription.id, topic: subscription.topic, type: subscription.type });
    }
  }

  private dispatch(frame: IncomingFrame): void {
    switch (frame.op) {
      case "publish": {
        const subscription = this.subscriptions.get(frame.topic);
        if (!subscription) {
          return;
        }
        for (const handler of subscription.handlers) {
          try {
            handler(frame.msg);
          } catch (error) {
            this.logger.error({ err: error, topic: frame.topic }, "Subscriber failed");
          }
        }
        return;
      }
      case "service_response": {
        const pending = frame.id ? this.pendingCalls.get(frame.id) : undefined;
        if (!pending || !frame.id) {
          return;
        }
        this.pendingCalls.delete(frame.id);
        clearTimeout(pending.timer);
        if (frame.result) {
          pending.resolve(frame.values);
        } else {
          pending.reject(new BridgeError(`Service ${frame.service} failed: ${JSON.stringify(frame.values)}`));
        }
        return;
      }
      case "action_feedback": {
        const pending = frame.id ? this.pendingGoals.get(frame.id) : undefined;
        pending?.onFeedback?.(frame.values);
        return;
      }
      case "action_result": {
        const pending = frame.id ? this.pendingGoals.get(frame.id) : undefined;
        if (!pending || !frame.id) {
          return;
        }
        this.pendingGoals.delete(frame.id);
        pending.resolve({ status: frame.status, result: frame.result, values: frame.values });
        return;
      }
      case "status":
        this.logger.warn({ level: frame.level, id: frame.id }, frame.msg ?? "Status message");
        return;
    }
  }

  private failPending(error: Error): void {
    for (const pending of this.pendingCalls.values()) {
      clearTimeout(pending.timer);
      pending.reject(error);
    }
    this.pendingCalls.clear();

    for (const pending of this.pendingGoals.values()) {
      pending.reject(error);
    }
    this.pendingGoals.clear();
  }

  private send(frame: OutgoingFrame): boolean {
    if (!this.socket || this.state !== ConnectionState.CONNECTED) {
      return false;
    }
    this.socket.send(encodeFrame(frame));
    return true;
  }

  private makeId(op: string, name: string): string {
    this.nextId += 1;
    return `${op}:${name}:${this.nextId}`;
  }
}
