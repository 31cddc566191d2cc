/**
 * Typed event emitter used by the registry, scheduler and push server.
 *
 * Subscriptions return a disposer. Each event keeps a frozen handler list
 * that is swapped on every change, so an emit always runs the handlers that
 * were subscribed when it started. A throwing handler is logged and skipped.
 */

export type EventMap = Record<string, unknown[]>;

export interface Emitter<E extends EventMap> {
  /** Subscribe to an event. Returns a disposer. */
  on<K extends keyof E & string>(event: K, handler: (...args: E[K]) => void): () => void;
  emit<K extends keyof E & string>(event: K, ...args: E[K]): void;
  /** Drop the handlers of one event, or of every event. */
  clear(event?: keyof E & string): void;
  count(event: keyof E & string): number;
}

type HandlerList<A extends unknown[]> = readonly ((...args: A) => void)[];

type HandlerLists<E extends EventMap> = {
  [K in keyof E]?: HandlerList<E[K]>;
};

export function createEmitter<E extends EventMap>(): Emitter<E> {
  let lists: HandlerLists<E> = {};

  function update<K extends keyof E>(
    event: K,
    change: (current: HandlerList<E[K]>) => HandlerList<E[K]>,
  ): void {
    const next: HandlerLists<E> = { ...lists };
    const updated = change(lists[event] ?? []);
    if (updated.length === 0) {
      delete next[event];
    } else {
      next[event] = Object.freeze([...updated]);
    }
    lists = next;
  }

  return {
    on(event, handler) {
      update(event, (current) => [...current, handler]);
      let active = true;
      return () => {
        if (!active) return;
        active = false;
        update(event, (current) => current.filter((h) => h !== handler));
      };
    },

    emit(event, ...args) {
      const current = lists[event];
      if (!current) return;
      for (const handler of current) {
        try {
          handler(...args);
        } catch (error) {
          console.warn(`[emitter] Handler for '${event}' threw:`, error);
        }
      }
    },

    clear(event) {
      if (event === undefined) {
        lists = {};
      } else {
        update(event, () => []);
      }
    },

    count(event) {
      return lists[event]?.length ?? 0;
    },
  };
}
