import type { EngineEvents, Logger } from '@tidewatch/core';

type Handler<D> = (data: D) => void;

/**
 * Event emitter keyed by an event map, so each event name carries its own payload type
 */
export type EventEmitter<M extends Record<string, unknown>> = {
  on: <E extends keyof M>(event: E, handler: Handler<M[E]>) => () => void;
  off: <E extends keyof M>(event: E, handler: Handler<M[E]>) => void;
  emit: <E extends keyof M>(event: E, data: M[E]) => void;
  listenerCount: (event: keyof M) => number;
};

export type EngineEventEmitter = EventEmitter<EngineEvents>;

export function createEventEmitter<M extends Record<string, unknown>>(
  logger?: Logger
): EventEmitter<M> {
  const handlers: { [E in keyof M]?: Set<Handler<M[E]>> } = {};

  function off<E extends keyof M>(event: E, handler: Handler<M[E]>): void {
    handlers[event]?.delete(handler);
  }

  function on<E extends keyof M>(event: E, handler: Handler<M[E]>): () => void {
    let set = handlers[event];
    if (!set) {
      set = new Set<Handler<M[E]>>();
      handlers[event] = set;
    }
    set.add(handler);
    return () => off(event, handler);
  }

  function emit<E extends keyof M>(event: E, data: M[E]): void {
    const set = handlers[event];
    if (!set) return;
    // Snapshot: a handler may unsubscribe while being notified
    for (const h of [...set]) {
      try {
        h(data);
      } catch (error) {
        logger?.error(
          { error: error instanceof Error ? error.message : String(error) },
          `Error in event handler for ${String(event)}`
        );
      }
    }
  }

  function listenerCount(event: keyof M): number {
    return handlers[event]?.size ?? 0;
  }

  return { on, off, emit, listenerCount };
}
