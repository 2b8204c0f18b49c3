/**
 * Producer Adapter
 *
 * Turns an input channel into a pull-based Stream of messages. This is the
 * push-to-pull seam: a subscribable channel pushes into a per-subscriber
 * buffer, and the consumer drains it with `subscription.next()`.
 */
import { createSignal, resource, suspend } from "effection";
import type { Operation, Stream, Subscription } from "effection";
import type { Message } from "../types/message.ts";
import type {
  InputChannel,
  QueueChannel,
  SubscribableChannel,
} from "../types/channel.ts";
import { useLogger } from "../logger/index.ts";

/**
 * Creates a Stream over an input channel.
 *
 * - subscribable channel: a receiver is registered for as long as the stream
 *   is subscribed; messages sent while nobody is subscribed are not kept
 * - queue channel: one message is taken per `next()`
 * - null channel: never yields, never completes
 *
 * Closing the channel completes the stream after buffered messages have been
 * delivered. Closing it with an error fails the stream with that error, also
 * when the channel was already closed before the stream was subscribed.
 *
 * @example
 * ```ts
 * const subscription = yield* toProducer(channel);
 * let next = yield* subscription.next();
 * while (!next.done) {
 *   handle(next.value);
 *   next = yield* subscription.next();
 * }
 * ```
 */
export function toProducer<T>(channel: InputChannel<T>): Stream<Message<T>, void> {
  switch (channel.kind) {
    case "subscribable":
      return fromSubscribable(channel);
    case "queue":
      return fromQueue(channel);
    case "null":
      return never();
  }
}

function fromSubscribable<T>(channel: SubscribableChannel<T>): Stream<Message<T>, void> {
  return resource(function* (provide) {
    const log = yield* useLogger("channel:producer");

    // The close value carries the error the channel was closed with, if any
    const signal = createSignal<Message<T>, Error | undefined>();
    const upstream: Subscription<Message<T>, Error | undefined> = yield* signal;

    const unsubscribe = channel.subscribe((message) => signal.send(message));
    const offClose = channel.onClose((error) => signal.close(error));
    log.debug({ channel: channel.name }, "producer subscribed");

    try {
      yield* provide({
        *next(): Operation<IteratorResult<Message<T>, void>> {
          const result = yield* upstream.next();
          if (!result.done) {
            return result;
          }
          if (result.value) {
            throw result.value;
          }
          return { done: true, value: undefined };
        },
      });
    } finally {
      unsubscribe();
      offClose();
      log.debug({ channel: channel.name }, "producer unsubscribed");
    }
  });
}

function fromQueue<T>(channel: QueueChannel<T>): Stream<Message<T>, void> {
  return resource(function* (provide) {
    yield* provide({
      *next(): Operation<IteratorResult<Message<T>, void>> {
        const message = yield* channel.receive();
        if (message === undefined) {
          return { done: true, value: undefined };
        }
        return { done: false, value: message };
      },
    });
  });
}

function never<T>(): Stream<Message<T>, void> {
  return resource(function* (provide) {
    yield* provide({
      *next(): Operation<IteratorResult<Message<T>, void>> {
        yield* suspend();
        return { done: true, value: undefined };
      },
    });
  });
}
