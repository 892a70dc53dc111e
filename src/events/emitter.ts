/**
 * fastscroll - Event Emitter
 * Typed pub/sub behind the list view's on / off
 */

import type { EventHandler, EventMap, Unsubscribe } from "../types";
import { LOG_PREFIX } from "../constants";

/** Event emitter over the events of `T` */
export interface Emitter<T extends EventMap> {
  /** Subscribe; the same handler is registered once per event */
  on<K extends keyof T>(event: K, handler: EventHandler<T[K]>): Unsubscribe;
  off<K extends keyof T>(event: K, handler: EventHandler<T[K]>): void;
  /** Call each handler of `event`, in subscription order */
  emit<K extends keyof T>(event: K, payload: T[K]): void;
  /** Drop every handler */
  clear(): void;
}

type HandlerSets<T extends EventMap> = {
  [K in keyof T]?: Set<EventHandler<T[K]>>;
};

// =============================================================================
// Factory
// =============================================================================

/**
 * Create an emitter. Handlers are snapshotted before dispatch: one added or
 * removed during an emit takes effect from the next emit. A throwing handler
 * is logged and the rest still run.
 */
export const createEmitter = <T extends EventMap>(): Emitter<T> => {
  let handlers: HandlerSets<T> = {};

  const off = <K extends keyof T>(event: K, handler: EventHandler<T[K]>): void => {
    const set = handlers[event];
    if (!set) return;
    set.delete(handler);
    if (set.size === 0) delete handlers[event];
  };

  const on = <K extends keyof T>(event: K, handler: EventHandler<T[K]>): Unsubscribe => {
    const set = handlers[event] ?? new Set<EventHandler<T[K]>>();
    set.add(handler);
    handlers[event] = set;
    return () => off(event, handler);
  };

  const emit = <K extends keyof T>(event: K, payload: T[K]): void => {
    const set = handlers[event];
    if (!set) return;
    for (const handler of [...set]) {
      try {
        handler(payload);
      } catch (error) {
        console.error(`${LOG_PREFIX} Error in "${String(event)}" handler:`, error);
      }
    }
  };

  const clear = (): void => {
    handlers = {};
  };

  return { on, off, emit, clear };
};
