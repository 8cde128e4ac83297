/**
 * Typed wrapper around the Node.js event emitter.
 */

import { EventEmitter } from 'node:events';

/**
 * Event map: event name to listener argument tuple.
 */
export type EventMap<T> = { [K in keyof T]: unknown[] };

/**
 * Event emitter whose event names and listener arguments are checked
 * against an event map interface.
 *
 * @example
 * ```typescript
 * interface Events {
 *   progress: [percent: number];
 * }
 * class Job extends TypedEventEmitter<Events> {}
 * new Job().on('progress', (percent) => console.log(percent));
 * ```
 */
export class TypedEventEmitter<Events extends EventMap<Events>> {
  private readonly emitter = new EventEmitter();

  on<K extends keyof Events & string>(
    event: K,
    listener: (...args: Events[K]) => void
  ): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<K extends keyof Events & string>(
    event: K,
    listener: (...args: Events[K]) => void
  ): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<K extends keyof Events & string>(
    event: K,
    listener: (...args: Events[K]) => void
  ): this {
    this.emitter.off(event, listener);
    return this;
  }

  listenerCount<K extends keyof Events & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): this {
    this.emitter.removeAllListeners();
    return this;
  }

  protected emit<K extends keyof Events & string>(
    event: K,
    ...args: Events[K]
  ): boolean {
    return this.emitter.emit(event, ...args);
  }
}
