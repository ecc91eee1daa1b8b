import { describe, test, expect, vi } from "vitest";
import { withRetry } from "./retry.ts";

class Flaky extends Error {}

const noSleep = () => Promise.resolve();

describe("withRetry", () => {
  test("returns the first successful result", async () => {
    const action = vi.fn(async () => "ok");
    await expect(withRetry(action, { attempts: 3, backoffMs: 10, shouldRetry: () => true, sleep: noSleep })).resolves.toBe("ok");
    expect(action).toHaveBeenCalledTimes(1);
  });

  test("retries retryable errors with doubling backoff", async () => {
    const delays: number[] = [];
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new Flaky(`fail ${calls}`);
        return calls;
      },
      {
        attempts: 3,
        backoffMs: 100,
        shouldRetry: (e) => e instanceof Flaky,
        sleep: async (ms) => {
          delays.push(ms);
        },
      }
    );
    expect(result).toBe(3);
    expect(delays).toEqual([100, 200]);
  });

  test("rethrows the last error once attempts are exhausted", async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Flaky(`fail ${calls}`);
        },
        { attempts: 2, backoffMs: 1, shouldRetry: () => true, sleep: noSleep }
      )
    ).rejects.toThrow("fail 2");
    expect(calls).toBe(2);
  });

  test("does not retry errors the predicate rejects", async () => {
    const onRetry = vi.fn();
    const action = vi.fn(async () => {
      throw new Error("fatal");
    });
    await expect(
      withRetry(action, { attempts: 5, backoffMs: 1, shouldRetry: (e) => e instanceof Flaky, onRetry, sleep: noSleep })
    ).rejects.toThrow("fatal");
    expect(action).toHaveBeenCalledTimes(1);
    expect(onRetry).not.toHaveBeenCalled();
  });

  test("passes the attempt number to the action", async () => {
    const seen: number[] = [];
    await withRetry(
      async (attempt) => {
        seen.push(attempt);
        if (attempt === 1) throw new Flaky("once");
      },
      { attempts: 3, backoffMs: 1, shouldRetry: () => true, sleep: noSleep }
    );
    expect(seen).toEqual([1, 2]);
  });
});
