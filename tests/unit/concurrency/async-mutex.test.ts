/**
 * Unit tests for AsyncMutex and withTimeout.
 */

import { AsyncMutex } from "../../../src/concurrency/async-mutex";
import { TimeoutError, withTimeout } from "../../../src/concurrency/timeout";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("AsyncMutex", () => {
  it("runs critical sections one at a time in arrival order", async () => {
    const mutex = new AsyncMutex();
    const log: string[] = [];
    const a = mutex.runExclusive(async () => {
      log.push("a:start");
      await delay(15);
      log.push("a:end");
    });
    const b = mutex.runExclusive(async () => {
      log.push("b:start");
      log.push("b:end");
    });
    expect(mutex.isLocked).toBe(true);
    await Promise.all([a, b]);
    expect(log).toEqual(["a:start", "a:end", "b:start", "b:end"]);
    expect(mutex.isLocked).toBe(false);
  });

  it("keeps working after a section rejects", async () => {
    const mutex = new AsyncMutex();
    await expect(
      mutex.runExclusive(() => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    await expect(mutex.runExclusive(() => 42)).resolves.toBe(42);
  });
});

describe("withTimeout", () => {
  it("resolves when the promise settles in time", async () => {
    await expect(withTimeout(Promise.resolve("ok"), 50, "llm")).resolves.toBe("ok");
  });

  it("rejects with TimeoutError when the promise is too slow", async () => {
    const never = new Promise<string>(() => undefined);
    const err = await withTimeout(never, 10, "vision").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TimeoutError);
    expect(err instanceof TimeoutError && err.message).toBe("vision timed out after 10ms");
  });

  it("passes through the underlying rejection", async () => {
    await expect(withTimeout(Promise.reject(new Error("denied")), 50, "llm")).rejects.toThrow("denied");
  });
});
