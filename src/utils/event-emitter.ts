/**
 * Type-safe event emitter used by routers and the simulation
 */

export type EventHandler<T = unknown> = (data: T) => void;

export type Unsubscribe = () => void;

export interface EventEmitter<TEvents extends Record<string, unknown>> {
  on<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): Unsubscribe;
  off<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void;
  once<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): Unsubscribe;
  emit<K extends keyof TEvents>(event: K, data: TEvents[K]): void;
  removeAllListeners(event?: keyof TEvents): void;
  listenerCount(event: keyof TEvents): number;
}

type HandlerMap<TEvents extends Record<string, unknown>> = {
  [K in keyof TEvents]?: Set<EventHandler<TEvents[K]>>;
};

export class TypedEventEmitter<TEvents extends Record<string, unknown>>
  implements EventEmitter<TEvents>
{
  private handlers: HandlerMap<TEvents> = {};

  /**
   * Register an event handler; the returned function removes it again
   */
  on<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): Unsubscribe {
    let set = this.handlers[event];
    if (!set) {
      set = new Set();
      this.handlers[event] = set;
    }
    set.add(handler);
    return () => this.off(event, handler);
  }

  off<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void {
    const set = this.handlers[event];
    if (!set) return;
    set.delete(handler);
    if (set.size === 0) {
      delete this.handlers[event];
    }
  }

  once<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): Unsubscribe {
    const wrapper: EventHandler<TEvents[K]> = (data) => {
      this.off(event, wrapper);
      handler(data);
    };
    return this.on(event, wrapper);
  }

  /**
   * Emit an event to all registered handlers
   */
  emit<K extends keyof TEvents>(event: K, data: TEvents[K]): void {
    const set = this.handlers[event];
    if (!set) return;
    // Handlers may unsubscribe while we iterate
    for (const handler of Array.from(set)) {
      handler(data);
    }
  }

  removeAllListeners(event?: keyof TEvents): void {
    if (event === undefined) {
      this.handlers = {};
    } else {
      delete this.handlers[event];
    }
  }

  listenerCount(event: keyof TEvents): number {
    return this.handlers[event]?.size ?? 0;
  }
}
