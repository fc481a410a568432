/**
 * Bounded readiness wait: each attempt is given a fixed timeout, and the
 * whole wait fails after `attempts` unsuccessful tries.
 */

import { CancelledError, ServiceUnavailableError } from "../errors.js";

export interface ReadinessOptions {
  attempts: number;
  timeoutMs: number;
  label: string;
  onRetry?: (attempt: number, attempts: number) => void;
  /** Aborting stops the wait with a CancelledError */
  signal?: AbortSignal;
}

export async function waitUntilReady(
  check: (timeoutMs: number, signal?: AbortSignal) => Promise<boolean>,
  options: ReadinessOptions,
): Promise<void> {
  const attempts = Math.max(1, options.attempts);

  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (options.signal?.aborted) {
      throw new CancelledError(`Waiting for "${options.label}"`);
    }

    let ready = false;
    try {
      ready = await check(options.timeoutMs, options.signal);
    } catch (error) {
      if (options.signal?.aborted) {
        throw new CancelledError(`Waiting for "${options.label}"`);
      }
      if (attempt === attempts) {
        throw new ServiceUnavailableError(options.label, undefined, { cause: error });
      }
    }

    if (options.signal?.aborted) {
      throw new CancelledError(`Waiting for "${options.label}"`);
    }
    if (ready) {
      return;
    }

    if (attempt < attempts) {
      options.onRetry?.(attempt, attempts);
    }
  }

  throw new ServiceUnavailableError(
    options.label,
    `Service "${options.label}" not ready after ${attempts} attempts`,
  );
}
