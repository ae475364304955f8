// src/EventEmitter.ts

type Listener<T> = (payload: T) => void;

/**
 * Synchronous listener fan-out keyed by event name. `EventMap` maps each
 * event name to the payload its listeners receive.
 *
 * A listener that throws is reported with `console.error`; the remaining
 * listeners still run.
 */
class EventEmitter<EventMap extends object> {
  private eventMap: { [K in keyof EventMap]?: Set<Listener<EventMap[K]>> } = {};

  public on<K extends keyof EventMap>(event: K, callback: Listener<EventMap[K]>): () => void {
    let callbacks = this.eventMap[event];
    if (!callbacks) {
      callbacks = new Set<Listener<EventMap[K]>>();
      this.eventMap[event] = callbacks;
    }
    callbacks.add(callback);
    return () => this.off(event, callback);
  }

  // Without a callback every listener for the event is removed
  public off<K extends keyof EventMap>(event: K, callback?: Listener<EventMap[K]>): void {
    const callbacks = this.eventMap[event];
    if (!callbacks) return;
    if (callback) {
      callbacks.delete(callback);
      if (callbacks.size === 0) {
        delete this.eventMap[event];
      }
    } else {
      delete this.eventMap[event];
    }
  }

  public emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const callbacks = this.eventMap[event];
    if (!callbacks) return;
    // Snapshot so listeners may unsubscribe while being notified
    for (const cb of [...callbacks]) {
      try {
        cb(payload);
      } catch (error) {
        console.error(`EventEmitter: listener for "${String(event)}" threw`, error);
      }
    }
  }

  public listenerCount<K extends keyof EventMap>(event: K): number {
    return this.eventMap[event]?.size ?? 0;
  }
}

export default EventEmitter;
