export type EventHandler<T> = (event: T) => void | Promise<void>;

/**
 * Best-effort, synchronous publish/subscribe keyed by event type.
 *
 * `publish` hands the event to every handler subscribed at that instant, in
 * registration order, and always returns normally: a failing handler is
 * never reported to the publisher. Delivery is at most once.
 */
export interface EventBus<M extends object> {
  publish<K extends keyof M>(type: K, event: M[K]): void;
  subscribe<K extends keyof M>(type: K, handler: EventHandler<M[K]>): void;
  /** Removes the first subscription of this exact handler, if any. */
  unsubscribe<K extends keyof M>(type: K, handler: EventHandler<M[K]>): void;
}
