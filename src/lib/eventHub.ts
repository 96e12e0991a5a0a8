export type Listener<A extends unknown[]> = (...args: A) => void;

/**
 * Minimal typed event hub. `M` maps event names to their argument tuples.
 * Listeners run synchronously in subscription order.
 */
export class EventHub<M extends { [K in keyof M]: unknown[] }> {
  private listeners: { [K in keyof M]?: Set<Listener<M[K]>> } = {};

  /** Subscribes and returns the matching unsubscribe function. */
  on<K extends keyof M>(event: K, fn: Listener<M[K]>): () => void {
    const set = this.listeners[event] ?? new Set<Listener<M[K]>>();
    this.listeners[event] = set;
    set.add(fn);
    return () => {
      set.delete(fn);
    };
  }

  emit<K extends keyof M>(event: K, ...args: M[K]) {
    const set = this.listeners[event];
    if (!set) return;
    for (const fn of [...set]) fn(...args);
  }
}
