// ---------------------------------------------------------------------------
// EventBus.ts — Typed publish/subscribe channel for the crafting core
// ---------------------------------------------------------------------------
// Each component owns one bus and declares its events as argument tuples.
// ---------------------------------------------------------------------------

/** Maps each event name to the tuple of arguments its listeners receive. */
export type EventArgsMap<T> = { [K in keyof T]: unknown[] };

export type EventListener<Args extends unknown[]> = (...args: Args) => void;

type ListenerTable<TEvents extends EventArgsMap<TEvents>> = {
  [K in keyof TEvents]?: Set<EventListener<TEvents[K]>>;
};

/**
 * Typed multi-listener emitter shared by the crafting engine, inventory and
 * recipe book.
 *
 * Listeners run synchronously in registration order. A listener that throws
 * is reported on the console and the remaining listeners still run.
 */
export class EventBus<TEvents extends EventArgsMap<TEvents>> {
  private _listeners: ListenerTable<TEvents> = {};
  private readonly _tag: string;

  constructor(tag: string) {
    this._tag = tag;
  }

  /**
   * Subscribe to an event.
   * @returns a function that removes the listener again.
   */
  on<K extends keyof TEvents>(event: K, cb: EventListener<TEvents[K]>): () => void {
    let set = this._listeners[event];
    if (!set) {
      set = new Set();
      this._listeners[event] = set;
    }
    set.add(cb);
    return () => this.off(event, cb);
  }

  /** Subscribe for a single emission only. */
  once<K extends keyof TEvents>(event: K, cb: EventListener<TEvents[K]>): () => void {
    const wrapper: EventListener<TEvents[K]> = (...args) => {
      this.off(event, wrapper);
      cb(...args);
    };
    return this.on(event, wrapper);
  }

  off<K extends keyof TEvents>(event: K, cb: EventListener<TEvents[K]>): void {
    this._listeners[event]?.delete(cb);
  }

  emit<K extends keyof TEvents>(event: K, ...args: TEvents[K]): void {
    const set = this._listeners[event];
    if (!set) return;
    // Snapshot so listeners may unsubscribe while we iterate.
    for (const cb of [...set]) {
      try {
        cb(...args);
      } catch (err: unknown) {
        console.error(`[${this._tag}] Listener for "${String(event)}" threw:`, err);
      }
    }
  }

  listenerCount<K extends keyof TEvents>(event: K): number {
    return this._listeners[event]?.size ?? 0;
  }

  clear(): void {
    this._listeners = {};
  }
}
