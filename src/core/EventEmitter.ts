/**
 * Event Emitter
 * Typed listener registry shared by the segment store and the pipeline.
 */

import { createLogger } from '../utils/logger';

const logger = createLogger('EventEmitter');

/**
 * Simple event emitter for a single event union.
 */
export class EventEmitter<TEvent extends { type: string }> {
  private listeners: Set<(event: TEvent) => void> = new Set();

  /**
   * Subscribe to events.
   * @returns Unsubscribe function
   */
  on(callback: (event: TEvent) => void): () => void {
    this.listeners.add(callback);
    return () => {
      this.listeners.delete(callback);
    };
  }

  /**
   * Emit an event to all listeners.
   */
  emit(event: TEvent): void {
    for (const callback of this.listeners) {
      try {
        callback(event);
      } catch (err) {
        logger.error('Event listener error', { event: event.type, error: err });
      }
    }
  }

  /**
   * Remove all listeners.
   */
  clear(): void {
    this.listeners.clear();
  }

  /**
   * Get the number of listeners.
   */
  get listenerCount(): number {
    return this.listeners.size;
  }
}
