/**
 * @module events
 * Type-safe event bus definitions for render progress reporting.
 */

import type { Depth, Rect } from './common';

/** Map of event names to their payload types. */
export interface EventMap {
  /** Fired once layout has succeeded and the output buffer is allocated. */
  'render:started': { name?: string; width: number; height: number; depth: Depth };
  /** Fired when a patch, its children and its overlay are complete. */
  'patch:rendered': { path: string; rect: Rect };
  /** Fired when an overlay image has been decoded. */
  'overlay:loaded': { path: string; file: string; width: number; height: number };
  /** Fired when the whole image is complete. */
  'render:finished': { durationMs: number };
}

/** Callback function type for event listeners. */
export type EventCallback<K extends keyof EventMap> = (payload: EventMap[K]) => void;

/** Type-safe event bus for pub/sub communication. */
export interface EventBus {
  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Subscribe to an event for a single emission. */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Unsubscribe a specific callback from an event. */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void;
  /** Emit an event with its payload. */
  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void;
  /** Remove all listeners for all events. */
  clear(): void;
}
