/**
 * @module event-bus
 * Type-safe pub/sub emitter for render progress.
 *
 * The renderer emits; front ends subscribe to log or display progress.
 *
 * @see {@link @testpattern/types#EventMap} for the event catalogue
 */

import type { EventBus, EventCallback, EventMap } from '@testpattern/types';

type EventName = keyof EventMap;

/** Listener as stored, with its payload type erased. */
type Listener = (payload: never) => void;

/**
 * Concrete implementation of {@link EventBus}.
 *
 * Each subscription is an entry in a per-event list; `once` entries are
 * flagged and removed before they run. Emission iterates a copy of the
 * list, so listeners may subscribe or unsubscribe while being called.
 */
export class EventBusImpl implements EventBus {
  private readonly subscriptions = new Map<EventName, Array<{ callback: Listener; once: boolean }>>();

  /** @inheritdoc */
  on<K extends EventName>(event: K, callback: EventCallback<K>): () => void {
    return this.subscribe(event, callback, false);
  }

  /** @inheritdoc */
  once<K extends EventName>(event: K, callback: EventCallback<K>): () => void {
    return this.subscribe(event, callback, true);
  }

  /** @inheritdoc */
  off<K extends EventName>(event: K, callback: EventCallback<K>): void {
    const entries = this.subscriptions.get(event);
    if (!entries) return;
    const index = entries.findIndex((entry) => entry.callback === callback);
    if (index >= 0) entries.splice(index, 1);
    if (entries.length === 0) this.subscriptions.delete(event);
  }

  /** @inheritdoc */
  emit<K extends EventName>(event: K, payload: EventMap[K]): void {
    const entries = this.subscriptions.get(event);
    if (!entries) return;
    for (const entry of [...entries]) {
      const callback = entry.callback as EventCallback<K>;
      if (entry.once) this.off(event, callback);
      callback(payload);
    }
  }

  /** @inheritdoc */
  clear(): void {
    this.subscriptions.clear();
  }

  private subscribe<K extends EventName>(event: K, callback: EventCallback<K>, once: boolean): () => void {
    const entries = this.subscriptions.get(event) ?? [];
    entries.push({ callback, once });
    this.subscriptions.set(event, entries);
    return () => this.off(event, callback);
  }
}
