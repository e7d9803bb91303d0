/**
 * Cancellable suspension points
 *
 * Everything goes through the global timer functions so fake timers in tests
 * drive them.
 */

/**
 * Raised when a deadline elapses. Named like the platform's timeout DOMException
 * so the classifier maps both the same way.
 */
export class DeadlineExceededError extends Error {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, message = `Deadline of ${timeoutMs}ms exceeded`) {
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Wait for `ms`. Resolves true when the time elapsed, false when `signal` aborted first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Signal that aborts when any of `signals` does. `release` detaches the listeners.
 */
export function linkSignals(signals: Array<AbortSignal | undefined>): {
  signal: AbortSignal;
  release: () => void;
} {
  const controller = new AbortController();
  const detach: Array<() => void> = [];

  for (const source of signals) {
    if (!source) continue;
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const onAbort = () => controller.abort(source.reason);
    source.addEventListener('abort', onAbort, { once: true });
    detach.push(() => source.removeEventListener('abort', onAbort));
  }

  return {
    signal: controller.signal,
    release: () => {
      for (const fn of detach) fn();
      detach.length = 0;
    }
  };
}

/**
 * Run `fn` with a signal that aborts after `timeoutMs` or when `parentSignal` aborts.
 * The returned promise rejects with the abort reason even if `fn` ignores its signal.
 */
export async function runWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs?: number,
  parentSignal?: AbortSignal
): Promise<T> {
  if (parentSignal?.aborted) {
    throw parentSignal.reason;
  }

  const deadline = new AbortController();
  const timer =
    timeoutMs !== undefined
      ? setTimeout(() => deadline.abort(new DeadlineExceededError(timeoutMs)), timeoutMs)
      : undefined;
  const linked = linkSignals([parentSignal, deadline.signal]);

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(linked.signal.reason);
    linked.signal.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([fn(linked.signal), aborted]);
  } finally {
    clearTimeout(timer);
    if (onAbort) linked.signal.removeEventListener('abort', onAbort);
    linked.release();
  }
}
