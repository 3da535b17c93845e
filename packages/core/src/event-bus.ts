/**
 * @module event-bus
 * Type-safe pub/sub event emitter.
 *
 * The layer store, selection model and editor report state changes through
 * an EventBus so the host can refresh its views without reaching into them.
 *
 * @see {@link @layerstack/types#EventBus} for the interface contract
 * @see {@link @layerstack/types#EventMap} for the event catalogue
 */

import type { EventBus, EventCallback, EventMap } from '@layerstack/types';

/** Generic callback type used internally by the event bus. */
type Callback = (...args: unknown[]) => void;

/** A registered listener. `once` listeners are dropped before they run. */
interface Listener {
  callback: Callback;
  once: boolean;
}

/**
 * Concrete implementation of {@link EventBus}.
 *
 * Listeners are kept per event in subscription order. A callback is stored
 * at most once per event and mode: registering it again with `on` (or again
 * with `once`) is a no-op, while `on` plus `once` keeps both entries. `off`
 * removes every entry of the callback.
 *
 * A listener that throws is logged and skipped; the remaining listeners still
 * run and the error never reaches the emitter.
 */
export class EventBusImpl implements EventBus {
  private listeners = new Map<keyof EventMap, Listener[]>();

  /** @inheritdoc */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    this.add(event, callback as Callback, false);
    return () => this.off(event, callback);
  }

  /** @inheritdoc */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    this.add(event, callback as Callback, true);
    return () => this.off(event, callback);
  }

  /** @inheritdoc */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void {
    this.remove(event, callback as Callback);
  }

  /** @inheritdoc */
  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void {
    const list = this.listeners.get(event);
    if (!list) return;

    // Snapshot: listeners added or removed while emitting take effect next time.
    for (const listener of [...list]) {
      if (listener.once) this.drop(event, (l) => l !== listener);
      try {
        listener.callback(...args);
      } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        console.error(`[core] Listener for "${event}" threw: ${reason}`);
      }
    }
  }

  /** @inheritdoc */
  clear(): void {
    this.listeners.clear();
  }

  /** Number of listeners currently registered for `event`. */
  listenerCount(event: keyof EventMap): number {
    return this.listeners.get(event)?.length ?? 0;
  }

  private add(event: keyof EventMap, callback: Callback, once: boolean): void {
    const list = this.listeners.get(event) ?? [];
    if (list.some((l) => l.callback === callback && l.once === once)) return;
    list.push({ callback, once });
    this.listeners.set(event, list);
  }

  private remove(event: keyof EventMap, callback: Callback): void {
    this.drop(event, (l) => l.callback !== callback);
  }

  private drop(event: keyof EventMap, keep: (listener: Listener) => boolean): void {
    const list = this.listeners.get(event);
    if (!list) return;

    const remaining = list.filter(keep);
    if (remaining.length === 0) {
      this.listeners.delete(event);
    } else {
      this.listeners.set(event, remaining);
    }
  }
}
