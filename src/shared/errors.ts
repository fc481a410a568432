export type PatrolErrorCode =
  | "SERVICE_UNAVAILABLE"
  | "PLAN_NOT_FOUND"
  | "ACTION_EXECUTION_FAILURE"
  | "INVALID_SELECTOR"
  | "MISSING_WAYPOINT"
  | "INVALID_CONFIG"
  | "KNOWLEDGE"
  | "BRIDGE"
  | "CANCELLED";

/**
 * Base error for everything the runtime raises on purpose
 */
export class PatrolError extends Error {
  readonly code: PatrolErrorCode;

  constructor(code: PatrolErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ServiceUnavailableError extends PatrolError {
  constructor(readonly service: string, message?: string, options?: { cause?: unknown }) {
    super("SERVICE_UNAVAILABLE", message ?? `Service "${service}" is not available`, options);
  }
}

export class PlanNotFoundError extends PatrolError {
  constructor(readonly goal: string, prefix = "Could not find plan to reach goal") {
    super("PLAN_NOT_FOUND", `${prefix} ${goal}`);
  }
}

export class MissingWaypointError extends PatrolError {
  constructor(readonly waypointId: string) {
    super("MISSING_WAYPOINT", `Waypoint "${waypointId}" is not in the waypoint table`);
  }
}

export class InvalidSelectorError extends PatrolError {
  constructor(readonly value: number | undefined) {
    super("INVALID_SELECTOR", `Invalid selector value: ${value === undefined ? "none received" : value}`);
  }
}

export class ConfigError extends PatrolError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_CONFIG", message, options);
  }
}

export class KnowledgeError extends PatrolError {
  constructor(message: string) {
    super("KNOWLEDGE", message);
  }
}

export class BridgeError extends PatrolError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("BRIDGE", message, options);
  }
}

export class CancelledError extends PatrolError {
  constructor(readonly operation: string) {
    super("CANCELLED", `${operation} cancelled`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
