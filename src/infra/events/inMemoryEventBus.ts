import type { EventBus, EventHandler } from '../../application/ports/eventBus.js';

export interface InMemoryEventBusOptions {
  /**
   * Receives handler failures. The bus itself neither logs nor rethrows them.
   */
  onHandlerError?: (error: unknown, eventType: string) => void;
}

type HandlerLists<M> = {
  [K in keyof M]?: EventHandler<M[K]>[];
};

/**
 * Synchronous in-process fan-out. Handlers run on the publisher's call stack
 * in registration order; the list is copied before dispatch, so a handler
 * added during a publish only sees later events.
 */
export class InMemoryEventBus<M extends object> implements EventBus<M> {
  private handlers: HandlerLists<M> = {};

  constructor(private readonly options: InMemoryEventBusOptions = {}) {}

  publish<K extends keyof M>(type: K, event: M[K]): void {
    const handlers = [...(this.handlers[type] ?? [])];

    for (const handler of handlers) {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          void result.catch((error: unknown) => this.handlerFailed(error, type));
        }
      } catch (error) {
        this.handlerFailed(error, type);
      }
    }
  }

  subscribe<K extends keyof M>(type: K, handler: EventHandler<M[K]>): void {
    this.handlers[type] = [...(this.handlers[type] ?? []), handler];
  }

  unsubscribe<K extends keyof M>(type: K, handler: EventHandler<M[K]>): void {
    const handlers = this.handlers[type];
    if (!handlers) {
      return;
    }

    const index = handlers.indexOf(handler);
    if (index !== -1) {
      this.handlers[type] = [...handlers.slice(0, index), ...handlers.slice(index + 1)];
    }
  }

  private handlerFailed(error: unknown, type: keyof M): void {
    this.options.onHandlerError?.(error, String(type));
  }
}
