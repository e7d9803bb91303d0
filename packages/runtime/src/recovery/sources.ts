/**
 * Source adapters
 */

import type { PollingScheduler } from '../polling/scheduler.js';
import type { FetchOperation, PollingOptions } from '../polling/types.js';
import type { Source } from './types.js';

/**
 * Poll `jobId` while subscribed. Successful ticks are values, failed ticks are
 * errors; the source ends when the session ends on its own (terminal value,
 * deadline, replacement or disposal).
 */
export function fromPolling<T>(
  scheduler: PollingScheduler,
  jobId: string,
  fetch: FetchOperation<T>,
  options: PollingOptions<T> = {}
): Source<T> {
  return (sink) => {
    let unsubscribed = false;
    const handle = scheduler.startPolling(
      jobId,
      fetch,
      (result) => {
        if (result.ok) {
          sink.next(result.value);
        } else {
          sink.error(result.error);
        }
      },
      undefined,
      options
    );

    void handle.done.then(() => {
      if (!unsubscribed) {
        sink.end();
      }
    });

    return () => {
      unsubscribed = true;
      handle.stop();
    };
  };
}

/**
 * Iterate a fresh iterable per subscription. A thrown error is reported and then
 * the source ends; unsubscribing aborts the signal handed to `factory`.
 */
export function fromAsyncIterable<T>(
  factory: (signal: AbortSignal) => AsyncIterable<T>
): Source<T> {
  return (sink) => {
    const controller = new AbortController();

    const pump = async () => {
      for await (const value of factory(controller.signal)) {
        if (controller.signal.aborted) return;
        sink.next(value);
      }
      if (!controller.signal.aborted) {
        sink.end();
      }
    };

    pump().catch((error: unknown) => {
      if (controller.signal.aborted) return;
      sink.error(error);
      sink.end();
    });

    return () => controller.abort();
  };
}
