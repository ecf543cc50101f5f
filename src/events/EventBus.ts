export type Listener<T> = (payload: T) => void;

type ListenerMap<Events> = {
  [K in keyof Events]?: Listener<Events[K]>[];
};

/** Synchronous pub/sub keyed by event name; listeners run in registration order. */
export class EventBus<Events extends object> {
  private listeners: ListenerMap<Events> = {};

  on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): () => void {
    const list = this.listeners[event] ?? [];
    list.push(listener);
    this.listeners[event] = list;
    return () => this.off(event, listener);
  }

  off<K extends keyof Events>(event: K, listener: Listener<Events[K]>): void {
    const list = this.listeners[event];
    if (!list) return;
    const idx = list.indexOf(listener);
    if (idx !== -1) {
      list.splice(idx, 1);
      if (list.length === 0) {
        delete this.listeners[event];
      }
    }
  }

  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const list = this.listeners[event];
    if (!list) return;
    for (const l of [...list]) {
      l(payload);
    }
  }
}
