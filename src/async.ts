/**
 * Timeout / cancellation helpers shared by every external call, plus the
 * small semaphore used to bound cross-query concurrency.
 */

/** Error thrown when an operation exceeds its time budget. */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: string) {
    super(
      context
        ? `Timeout after ${timeoutMs}ms: ${context}`
        : `Operation timed out after ${timeoutMs}ms`,
    );
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Error thrown when the caller's signal aborted the operation. */
export class AbortedError extends Error {
  constructor(context?: string) {
    super(context ? `Aborted: ${context}` : "Operation aborted");
    this.name = "AbortedError";
  }
}

export interface DeadlineOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Context string for error messages. */
  context?: string;
}

/**
 * Run `fn` with a signal that fires when either the caller's signal aborts or
 * `timeoutMs` elapses, whichever comes first. The returned promise rejects
 * with {@link TimeoutError} / {@link AbortedError} as soon as that happens,
 * even if `fn` ignores its signal.
 */
export async function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions = {},
): Promise<T> {
  const { timeoutMs, signal, context } = options;
  if (signal?.aborted) throw new AbortedError(context);

  const controller = new AbortController();
  const cleanup: Array<() => void> = [];

  const guard = new Promise<never>((_, reject) => {
    if (timeoutMs && Number.isFinite(timeoutMs) && timeoutMs > 0) {
      const timer = setTimeout(() => {
        controller.abort();
        reject(new TimeoutError(timeoutMs, context));
      }, timeoutMs);
      cleanup.push(() => clearTimeout(timer));
    }
    if (signal) {
      const onAbort = () => {
        controller.abort();
        reject(new AbortedError(context));
      };
      signal.addEventListener("abort", onAbort, { once: true });
      cleanup.push(() => signal.removeEventListener("abort", onAbort));
    }
  });

  try {
    return await Promise.race([fn(controller.signal), guard]);
  } finally {
    for (const release of cleanup) release();
  }
}

/**
 * Counting semaphore. `run` waits for a free slot, executes the task and
 * releases the slot whether the task resolved or rejected.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  public constructor(permits: number) {
    this.available = Math.max(1, Math.floor(permits));
  }

  public async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) next();
    else this.available++;
  }
}

/**
 * A signal that aborts after `timeoutMs` or when `parent` aborts. Call
 * `dispose` once the guarded work is done to release the timer.
 */
export function deadlineSignal(
  timeoutMs: number | undefined,
  parent?: AbortSignal,
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const cleanup: Array<() => void> = [];
  if (parent?.aborted) {
    controller.abort();
  } else if (parent) {
    const onAbort = () => controller.abort();
    parent.addEventListener("abort", onAbort, { once: true });
    cleanup.push(() => parent.removeEventListener("abort", onAbort));
  }
  if (timeoutMs && Number.isFinite(timeoutMs) && timeoutMs > 0) {
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    cleanup.push(() => clearTimeout(timer));
  }
  return {
    signal: controller.signal,
    dispose: () => {
      for (const release of cleanup) release();
    },
  };
}

/** Resolve after `ms`, or reject with {@link AbortedError} as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError("sleep"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError("sleep"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
