import { describe, expect, it, vi } from "vitest";
import { BROWSER_RETRY_OPTIONS, RetryError, withRetry } from "./retry";

const fast = { baseDelayMs: 1, jitterMs: 0 };

describe("withRetry", () => {
  it("should return the first successful result", async () => {
    const op = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValueOnce("ok");

    await expect(withRetry(op, { maxRetries: 2, ...fast })).resolves.toBe("ok");
    expect(op).toHaveBeenCalledTimes(2);
  });

  it("should wrap the last error once retries are exhausted", async () => {
    const op = vi.fn(async () => {
      throw new Error("still down");
    });

    const err = await withRetry(op, { maxRetries: 2, ...fast }).catch(
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(RetryError);
    if (!(err instanceof RetryError)) return;
    expect(err.message).toBe("Operation failed after 3 attempts");
    expect(err.attempt).toBe(3);
    expect(err.originalError.message).toBe("still down");
    expect(op).toHaveBeenCalledTimes(3);
  });

  it("should rethrow immediately when the condition rejects the error", async () => {
    const op = vi.fn(async () => {
      throw new Error("Timeout 30000ms exceeded");
    });

    await expect(
      withRetry(op, { ...BROWSER_RETRY_OPTIONS, ...fast }),
    ).rejects.toThrow("Timeout 30000ms exceeded");
    expect(op).toHaveBeenCalledTimes(1);
  });

  it("should report each retry", async () => {
    const onRetry = vi.fn();
    const op = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new Error("net::ERR_CONNECTION_RESET"))
      .mockResolvedValueOnce(1);

    await withRetry(op, { ...BROWSER_RETRY_OPTIONS, ...fast, onRetry });

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][1]).toBe(1);
  });
});
