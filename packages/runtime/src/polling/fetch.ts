import type { Result } from '@tidewatch/core';
import type { FetchOperation } from './types.js';

/**
 * Adapt a fetch that reports failure through a Result into one that throws,
 * so the error reaches the classifier
 */
export function fromResultFetch<T, E>(
  fetch: (signal: AbortSignal) => Promise<Result<T, E>>
): FetchOperation<T> {
  return async (signal) => {
    const result = await fetch(signal);
    if (result.ok) {
      return result.value;
    }
    throw result.error;
  };
}
