import { describe, it, expect, vi } from "vitest";
import { waitUntilReady } from "@shared/utils/retry.js";
import { CancelledError, ServiceUnavailableError } from "@shared/errors.js";

describe("waitUntilReady", () => {
  it("should resolve on the first successful check", async () => {
    const check = vi.fn().mockResolvedValueOnce(false).mockResolvedValueOnce(true);
    const onRetry = vi.fn();

    await waitUntilReady(check, { attempts: 3, timeoutMs: 50, label: "nav", onRetry });

    expect(check).toHaveBeenCalledTimes(2);
    expect(check).toHaveBeenCalledWith(50, undefined);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith(1, 3);
  });

  it("should give up after the configured number of attempts", async () => {
    const check = vi.fn().mockResolvedValue(false);
    const onRetry = vi.fn();

    const wait = waitUntilReady(check, { attempts: 12, timeoutMs: 5, label: "navigate_to_pose", onRetry });

    await expect(wait).rejects.toBeInstanceOf(ServiceUnavailableError);
    await expect(wait).rejects.toThrow('Service "navigate_to_pose" not ready after 12 attempts');
    expect(check).toHaveBeenCalledTimes(12);
    expect(onRetry).toHaveBeenCalledTimes(11);
  });

  it("should keep trying when a check throws before the last attempt", async () => {
    const check = vi.fn().mockRejectedValueOnce(new Error("boom")).mockResolvedValueOnce(true);
    await expect(waitUntilReady(check, { attempts: 2, timeoutMs: 5, label: "x" })).resolves.toBeUndefined();
  });

  it("should wrap a throw on the last attempt", async () => {
    const cause = new Error("socket closed");
    const check = vi.fn().mockRejectedValue(cause);

    const error = await waitUntilReady(check, { attempts: 1, timeoutMs: 5, label: "planner" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceUnavailableError);
    expect(error).toMatchObject({ code: "SERVICE_UNAVAILABLE", service: "planner", cause });
  });

  it("should stop with a CancelledError once the signal aborts", async () => {
    const abort = new AbortController();
    const check = vi.fn(async () => {
      abort.abort();
      return true;
    });

    const error = await waitUntilReady(check, { attempts: 5, timeoutMs: 5, label: "navigation", signal: abort.signal })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CancelledError);
    expect(error).toMatchObject({ code: "CANCELLED", message: 'Waiting for "navigation" cancelled' });
    expect(check).toHaveBeenCalledTimes(1);
    expect(check).toHaveBeenCalledWith(5, abort.signal);
  });

  it("should not check at all when the signal is already aborted", async () => {
    const abort = new AbortController();
    abort.abort();
    const check = vi.fn().mockResolvedValue(true);

    await expect(
      waitUntilReady(check, { attempts: 3, timeoutMs: 5, label: "navigation", signal: abort.signal }),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(check).not.toHaveBeenCalled();
  });
});
