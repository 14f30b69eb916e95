/**
 * Typed Event Emitter
 *
 * A small type-safe emitter used as a base class by stateful services.
 *
 * @example
 * interface JobEvents {
 *   'done': { id: string };
 * }
 *
 * class Job extends EventEmitter<JobEvents> {
 *   finish(id: string) {
 *     this.emit('done', { id });
 *   }
 * }
 *
 * const unsubscribe = new Job().on('done', ({ id }) => console.log(id));
 */

import { debugLog } from '../debug.ts';

export type EventCallback<T> = (data: T) => void;

export type Unsubscribe = () => void;

type ListenerMap<Events> = { [K in keyof Events]?: Set<EventCallback<Events[K]>> };

export class EventEmitter<Events extends Record<string, unknown>> {
  private listeners: ListenerMap<Events> = {};

  /**
   * Subscribe to an event.
   *
   * @returns Unsubscribe function to remove the listener
   */
  on<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): Unsubscribe {
    const callbacks = this.listeners[event] ?? new Set<EventCallback<Events[K]>>();
    this.listeners[event] = callbacks;
    callbacks.add(callback);

    return () => {
      callbacks.delete(callback);
      if (callbacks.size === 0) {
        delete this.listeners[event];
      }
    };
  }

  /**
   * Call every listener synchronously, in registration order.
   * A throwing listener is logged and does not stop the others.
   */
  protected emit<K extends keyof Events>(event: K, data: Events[K]): void {
    const callbacks = this.listeners[event];
    if (!callbacks) return;

    for (const callback of [...callbacks]) {
      try {
        callback(data);
      } catch (error) {
        debugLog(`[EventEmitter] Error in event handler for "${String(event)}": ${error}`);
      }
    }
  }

  removeAllListeners(): void {
    this.listeners = {};
  }
}
