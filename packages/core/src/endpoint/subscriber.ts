import type {
  ConsumerHandler,
  Demand,
  Lifecycle,
  MessageHandler,
  MessageSubscriber,
} from "../types/handler.ts";

/**
 * A `MessageHandler` presented as a subscriber.
 *
 * Requests unbounded demand on subscribe and calls the handler for every
 * message. Completion of the upstream cancels the subscription.
 */
export interface MessageHandlerSubscriber<T = unknown>
  extends MessageSubscriber<T>,
    Lifecycle {
  readonly handler: MessageHandler<T>;
  /** Cancel the upstream subscription, once. */
  dispose(): void;
  isDisposed(): boolean;
}

/**
 * Wrap a synchronous handler as a subscriber.
 *
 * `start`/`stop` forward to `lifecycle`, when the handler has one; without
 * it the subscriber always reports itself running.
 *
 * @example
 * ```ts
 * const subscriber = createMessageHandlerSubscriber({
 *   handleMessage(message) {
 *     console.log(message.payload);
 *   },
 * });
 * const endpoint = yield* createConsumerEndpoint(
 *   channel,
 *   fromMessageHandlerSubscriber(subscriber),
 * );
 * ```
 */
export function createMessageHandlerSubscriber<T>(
  handler: MessageHandler<T>,
  lifecycle?: Lifecycle,
): MessageHandlerSubscriber<T> {
  let demand: Demand | undefined;

  const subscriber: MessageHandlerSubscriber<T> = {
    handler,

    onSubscribe(upstream) {
      demand = upstream;
      upstream.request(Infinity);
    },

    onNext(message) {
      handler.handleMessage(message);
    },

    // Upstream failures are the endpoint's concern (see `upstreamErrors`)
    onError() {},

    onComplete() {
      subscriber.dispose();
    },

    dispose() {
      const current = demand;
      if (current) {
        demand = undefined;
        current.cancel();
      }
    },

    isDisposed: () => demand === undefined,

    *start() {
      if (lifecycle) {
        yield* lifecycle.start();
      }
    },

    *stop() {
      if (lifecycle) {
        yield* lifecycle.stop();
      }
    },

    isRunning: () => (lifecycle ? lifecycle.isRunning() : true),
  };

  return subscriber;
}

/**
 * Endpoint handler selection for an existing `MessageHandlerSubscriber`:
 * its handler is exposed for introspection and its lifecycle is driven by
 * the endpoint.
 */
export function fromMessageHandlerSubscriber<T>(
  subscriber: MessageHandlerSubscriber<T>,
): ConsumerHandler<T> {
  return {
    kind: "subscriber",
    subscriber,
    handler: subscriber.handler,
    lifecycle: subscriber,
  };
}
