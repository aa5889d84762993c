import type { EventMapLike } from '../types';

const symbol: typeof Symbol.dispose =
  Symbol.dispose ?? Symbol.for('Symbol.dispose');

type Listener<E> = (evt: E) => void;

/**
 * Synchronous, typed event emitter
 *
 * Listeners run in insertion order inside {@link EventEmitter.emit}. An error
 * thrown by a listener is not caught, it reaches whoever emitted the event.
 *
 * @example
 *
 * ```ts
 * class Recorder extends EventEmitter<{ row: string }> {}
 * const recorder = new Recorder().on('row', (row) => console.log(row));
 * recorder.emit('row', 'a,b,c');
 * recorder[Symbol.dispose](); // emits `dispose`
 * ```
 */
export class EventEmitter<
  M extends EventMapLike & { dispose?: never },
  EventMap extends { dispose: null } = M & { dispose: null },
> implements Disposable
{
  protected listeners: {
    [K in keyof EventMap]?: Set<Listener<EventMap[K]>>;
  } = {};
  [symbol]() {
    this.emit('dispose', null);
  }
  /** Add event listener */
  on<K extends keyof EventMap>(type: K, listener: Listener<EventMap[K]>) {
    const listeners: Set<Listener<EventMap[K]>> =
      this.listeners[type] ?? new Set();
    this.listeners[type] = listeners.add(listener);
    return this;
  }
  /** Remove event listener */
  off<K extends keyof EventMap>(type: K, listener: Listener<EventMap[K]>) {
    this.listeners[type]?.delete(listener);
    return this;
  }
  /** Add one-time event listener, can not be removed manually */
  once<K extends keyof EventMap>(type: K, listener: Listener<EventMap[K]>) {
    const wrapper = (evt: EventMap[K]) => {
      try {
        listener(evt);
      } finally {
        this.off(type, wrapper);
      }
    };
    return this.on(type, wrapper);
  }
  /** Emit event listeners */
  emit<K extends keyof EventMap>(type: K, e: EventMap[K]) {
    const listeners = this.listeners[type];
    if (listeners) for (const listener of [...listeners]) listener(e);
    return this;
  }
}
