import { createSilentLogger, type Logger } from '@tidewatch/core';

/**
 * Guaranteed-release scope
 *
 * Cleanups registered with `defer` run once, last-in first-out, on the first
 * `dispose()`. Later calls are no-ops; cleanups deferred after disposal run
 * immediately.
 */
export type DisposableScope = {
  readonly signal: AbortSignal;
  readonly disposed: boolean;
  defer(cleanup: () => void): void;
  dispose(reason?: unknown): void;
};

export function createScope(logger: Logger = createSilentLogger()): DisposableScope {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];
  let disposed = false;

  const run = (cleanup: () => void) => {
    try {
      cleanup();
    } catch (error) {
      logger.warn(
        { error: error instanceof Error ? error.message : String(error) },
        'Cleanup failed during dispose'
      );
    }
  };

  return {
    signal: controller.signal,
    get disposed() {
      return disposed;
    },
    defer(cleanup) {
      if (disposed) {
        run(cleanup);
        return;
      }
      cleanups.push(cleanup);
    },
    dispose(reason) {
      if (disposed) return;
      disposed = true;
      controller.abort(reason);
      for (let cleanup = cleanups.pop(); cleanup; cleanup = cleanups.pop()) {
        run(cleanup);
      }
    }
  };
}
