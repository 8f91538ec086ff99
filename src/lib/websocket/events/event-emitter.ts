/**
 * EventEmitter
 * Lightweight typed event emitter; a throwing listener never stops the others
 */

import { logger } from '../../utils/logger';

export type EventCallback<T = unknown> = (data: T) => void;

type ListenerMap<TEventMap> = {
  [K in keyof TEventMap]?: Set<EventCallback<TEventMap[K]>>;
};

export class EventEmitter<TEventMap extends Record<string, unknown> = Record<string, unknown>> {
  private listeners: ListenerMap<TEventMap> = {};

  /**
   * Subscribe to an event
   * @returns unsubscribe function
   */
  on<K extends keyof TEventMap>(event: K, callback: EventCallback<TEventMap[K]>): () => void {
    const callbacks = this.listeners[event] ?? new Set<EventCallback<TEventMap[K]>>();
    callbacks.add(callback);
    this.listeners[event] = callbacks;

    return () => {
      this.off(event, callback);
    };
  }

  /**
   * Subscribe to an event once (automatically unsubscribes after first emission)
   */
  once<K extends keyof TEventMap>(event: K, callback: EventCallback<TEventMap[K]>): () => void {
    const onceCallback: EventCallback<TEventMap[K]> = (data) => {
      this.off(event, onceCallback);
      callback(data);
    };
    return this.on(event, onceCallback);
  }

  off<K extends keyof TEventMap>(event: K, callback: EventCallback<TEventMap[K]>): void {
    const callbacks = this.listeners[event];
    if (callbacks) {
      callbacks.delete(callback);
      if (callbacks.size === 0) {
        delete this.listeners[event];
      }
    }
  }

  emit<K extends keyof TEventMap>(event: K, data: TEventMap[K]): void {
    const callbacks = this.listeners[event];
    if (!callbacks) {
      return;
    }

    // Snapshot so listeners may unsubscribe while being notified
    for (const callback of Array.from(callbacks)) {
      try {
        callback(data);
      } catch (error) {
        logger.error(`Error in event listener for ${String(event)}`, error, { event: String(event) });
      }
    }
  }

  removeAllListeners<K extends keyof TEventMap>(event?: K): void {
    if (event !== undefined) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
  }

  listenerCount<K extends keyof TEventMap>(event: K): number {
    return this.listeners[event]?.size ?? 0;
  }
}
