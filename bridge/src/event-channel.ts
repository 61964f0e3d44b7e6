import { EventEmitter } from "events";

type EventMap = { [event: string]: unknown[] };

/**
 * Typed observer registration over a private EventEmitter. Listener
 * exceptions are logged and isolated so one faulty subscriber cannot break
 * delivery to the rest or unwind into the connection code.
 */
export class EventChannel<Events extends EventMap> {
  private readonly emitter = new EventEmitter();

  constructor(private readonly tag: string) {
    this.emitter.setMaxListeners(0);
  }

  on<K extends keyof Events & string>(
    event: K,
    listener: (...args: Events[K]) => void
  ): () => void {
    const wrapped = (...args: Events[K]): void => {
      try {
        listener(...args);
      } catch (error) {
        console.error(`[${this.tag}] ${event} listener failed`, error);
      }
    };
    this.emitter.on(event, wrapped);
    return () => {
      this.emitter.off(event, wrapped);
    };
  }

  once<K extends keyof Events & string>(
    event: K,
    listener: (...args: Events[K]) => void
  ): () => void {
    const off = this.on(event, (...args) => {
      off();
      listener(...args);
    });
    return off;
  }

  emit<K extends keyof Events & string>(event: K, ...args: Events[K]): void {
    this.emitter.emit(event, ...args);
  }

  listenerCount<K extends keyof Events & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
