import { describe, expect, it } from "vitest";
import { AbortedError, deadlineSignal, Semaphore, TimeoutError, withDeadline } from "../async";

const never = () => new Promise<never>(() => undefined);

describe("withDeadline", () => {
  it("should resolve with the task's value", async () => {
    await expect(withDeadline(async () => 42, { timeoutMs: 1000 })).resolves.toBe(42);
  });

  it("should reject with TimeoutError and abort the task's signal", async () => {
    let seen: AbortSignal | undefined;
    const task = (signal: AbortSignal) => {
      seen = signal;
      return never();
    };
    await expect(withDeadline(task, { timeoutMs: 20, context: "embed" })).rejects.toThrow(TimeoutError);
    expect(seen?.aborted).toBe(true);
  });

  it("should reject with AbortedError when the caller aborts", async () => {
    const controller = new AbortController();
    const pending = withDeadline(never, { signal: controller.signal });
    controller.abort();
    await expect(pending).rejects.toThrow(AbortedError);
  });

  it("should reject immediately for an already aborted signal", async () => {
    await expect(withDeadline(never, { signal: AbortSignal.abort() })).rejects.toThrow("Operation aborted");
  });
});

describe("deadlineSignal", () => {
  it("should abort after the timeout", async () => {
    const { signal, dispose } = deadlineSignal(10);
    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(signal.aborted).toBe(true);
    dispose();
  });

  it("should follow the parent signal", () => {
    const parent = new AbortController();
    const { signal, dispose } = deadlineSignal(undefined, parent.signal);
    parent.abort();
    expect(signal.aborted).toBe(true);
    dispose();
  });
});

describe("Semaphore", () => {
  it("should bound the number of tasks in flight", async () => {
    const semaphore = new Semaphore(2);
    let active = 0;
    let peak = 0;
    const task = async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
    };
    await Promise.all(Array.from({ length: 6 }, () => semaphore.run(task)));
    expect(peak).toBe(2);
  });

  it("should release the slot when a task rejects", async () => {
    const semaphore = new Semaphore(1);
    await expect(semaphore.run(() => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(semaphore.run(async () => "next")).resolves.toBe("next");
  });
});
