export type Listener<Args extends unknown[]> = (...args: Args) => void;

/**
 * Event name to listener argument tuple.
 */
export type EventMap = Record<string, unknown[]>;

/**
 * Minimal synchronous event emitter.
 *
 * Listeners run in registration order inside `emit`, so paired events
 * (e.g. tagsAboutToChange / tagsChanged) are observed without an event loop
 * turn between them. `on` returns the matching unsubscribe function.
 */
export class Emitter<Events extends EventMap> {
  private readonly listeners: {
    [K in keyof Events]?: Set<Listener<Events[K]>>;
  } = {};

  on<K extends keyof Events>(
    event: K,
    listener: Listener<Events[K]>,
  ): () => void {
    const set = this.listeners[event] ?? new Set<Listener<Events[K]>>();
    this.listeners[event] = set;
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  emit<K extends keyof Events>(event: K, ...args: Events[K]): void {
    const set = this.listeners[event];
    if (!set) return;
    // Copy so listeners may unsubscribe while being notified
    for (const listener of [...set]) {
      listener(...args);
    }
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.listeners[event]?.size ?? 0;
  }
}
