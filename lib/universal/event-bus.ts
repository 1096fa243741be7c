/**
 * Create a strongly-typed, synchronous event bus.
 *
 * Listener call signatures are derived from a generic event map `M`, so a
 * listener for `"volume:done"` receives exactly the payload type declared for
 * that key:
 *
 * ```ts
 * type BusEvents = {
 *   "volume:start": { volume: number };
 *   "volume:done": { volume: number; branches: number };
 * };
 *
 * const bus = eventBus<BusEvents>();
 * const off = bus.on("volume:done", ({ volume, branches }) => { … });
 * bus.emit("volume:done", { volume: 1, branches: 12 });
 * off();
 * ```
 *
 * ## Delivery
 * `emit(type, detail)` calls the current listeners in registration order, then
 * the catch-all observers registered with `all()`. Delivery is synchronous: a
 * listener that throws stops the emit and the error reaches the emitter.
 *
 * ## Control utilities
 * - `on(type, listener)` / `once(type, listener)`: add listeners and return an
 *   unsubscribe function. `on` de-dupes per listener identity.
 * - `off(type, listener)`: remove a specific listener.
 * - `removeAllListeners(type?)`: remove listeners for one event or all events.
 * - `listenerCount(type)` / `eventNames()`: quick introspection.
 * - `mute(type)` / `unmute(type)`: temporarily suppress emits for an event.
 * - `suspend()` / `resume()`: globally suppress all emits.
 */
export function eventBus<M extends Record<string, unknown>>() {
  type Key = Extract<keyof M, string>;
  type Listener<K extends Key> = (detail: M[K]) => void;
  type AllFn = <K extends Key>(type: K, detail: M[K]) => void;

  const listeners: { [K in Key]?: Set<Listener<K>> } = {};
  const muted = new Set<Key>();
  const allListeners = new Set<AllFn>();
  let suspended = false;

  const setOf = <K extends Key>(type: K): Set<Listener<K>> => {
    const existing = listeners[type];
    if (existing) return existing;
    const created = new Set<Listener<K>>();
    listeners[type] = created;
    return created;
  };

  const api = {
    on<K extends Key>(type: K, listener: Listener<K>) {
      setOf(type).add(listener);
      return () => {
        api.off(type, listener);
      };
    },

    once<K extends Key>(type: K, listener: Listener<K>) {
      const wrapper: Listener<K> = (detail) => {
        api.off(type, wrapper);
        listener(detail);
      };
      setOf(type).add(wrapper);
      return () => {
        api.off(type, wrapper);
      };
    },

    off<K extends Key>(type: K, listener: Listener<K>) {
      const set = listeners[type];
      if (!set) return;
      set.delete(listener);
      if (set.size === 0) delete listeners[type];
    },

    emit<K extends Key>(type: K, detail: M[K]) {
      if (suspended || muted.has(type)) return false;
      const set = listeners[type];
      // snapshot: once-listeners remove themselves while we iterate
      for (const l of set ? Array.from(set) : []) l(detail);
      for (const fn of allListeners) fn(type, detail);
      return true;
    },

    all(listener: AllFn) {
      allListeners.add(listener);
      return () => {
        allListeners.delete(listener);
      };
    },

    listenerCount<K extends Key>(type: K) {
      return listeners[type]?.size ?? 0;
    },

    eventNames(): readonly string[] {
      return Object.freeze(Object.keys(listeners));
    },

    removeAllListeners(type?: Key) {
      if (type) {
        delete listeners[type];
        return;
      }
      for (const k of Object.keys(listeners)) {
        Reflect.deleteProperty(listeners, k);
      }
      allListeners.clear();
    },

    mute<K extends Key>(type: K) {
      muted.add(type);
    },
    unmute<K extends Key>(type: K) {
      muted.delete(type);
    },
    suspend() {
      suspended = true;
    },
    resume() {
      suspended = false;
    },
  } as const;

  return api;
}

export type EventBus<M extends Record<string, unknown>> = ReturnType<
  typeof eventBus<M>
>;
