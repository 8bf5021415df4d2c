/**
 * Unit tests for retry with backoff
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import { calculateDelayWithJitter, retryWithBackoff } from "../../../src/lib/retry.js";
import {
  OperationCancelledError,
  ProviderThrottledError,
  ProviderUnavailableError,
} from "../../../src/lib/sweep-errors.js";

describe("calculateDelayWithJitter", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should pick a point below the doubled base delay", () => {
    vi.spyOn(Math, "random").mockReturnValue(0.5);

    expect(calculateDelayWithJitter(0, 200, 5000)).toBe(100);
    expect(calculateDelayWithJitter(2, 200, 5000)).toBe(400);
  });

  it("should cap the delay at the maximum", () => {
    vi.spyOn(Math, "random").mockReturnValue(0.5);

    expect(calculateDelayWithJitter(10, 200, 5000)).toBe(2500);
  });

  it("should never reach the cap itself", () => {
    vi.spyOn(Math, "random").mockReturnValue(0.999_999);

    expect(calculateDelayWithJitter(0, 200, 5000)).toBe(199);
  });
});

describe("retryWithBackoff", () => {
  const sleep = vi.fn(async () => {});

  afterEach(() => {
    sleep.mockClear();
  });

  it("should return the first successful result", async () => {
    const operation = vi.fn(async () => "done");

    await expect(retryWithBackoff(operation, { sleep })).resolves.toBe("done");
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("should retry throttling until it succeeds", async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new ProviderThrottledError("Rate exceeded"))
      .mockRejectedValueOnce(new ProviderThrottledError("Rate exceeded"))
      .mockResolvedValue("done");
    const onRetry = vi.fn();

    await expect(retryWithBackoff(operation, { sleep, onRetry })).resolves.toBe("done");
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls.map((call) => call[1])).toEqual([1, 2]);
  });

  it("should surface other errors on the first attempt", async () => {
    const error = new ProviderUnavailableError("Access Denied");
    const operation = vi.fn(async () => {
      throw error;
    });

    await expect(retryWithBackoff(operation, { sleep })).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("should throw the last error once attempts run out", async () => {
    const last = new ProviderThrottledError("still throttled");
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new ProviderThrottledError("Rate exceeded"))
      .mockRejectedValueOnce(last);

    await expect(retryWithBackoff(operation, { maxAttempts: 2, sleep })).rejects.toBe(last);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it("should honour a custom retry predicate", async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValueOnce(new Error("flaky")).mockResolvedValue("ok");

    await expect(
      retryWithBackoff(operation, { sleep, shouldRetry: (error) => error instanceof Error && error.message === "flaky" }),
    ).resolves.toBe("ok");
  });

  it("should stop once the signal fires", async () => {
    const controller = new AbortController();
    const operation = vi.fn(async () => {
      controller.abort();
      throw new ProviderThrottledError("Rate exceeded");
    });

    await expect(retryWithBackoff(operation, { sleep, signal: controller.signal })).rejects.toBeInstanceOf(
      OperationCancelledError,
    );
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
