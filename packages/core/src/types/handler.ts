import type { Operation } from "effection";
import type { Message } from "./message.ts";
import type { MessageChannel } from "./channel.ts";

/**
 * Handler and subscriber types.
 *
 * There are two ways to process a message: synchronously, one at a time
 * (`MessageHandler`), or by returning an operation that completes when the
 * message has been processed (`ReactiveMessageHandler`). A third option is to
 * take over the pull loop entirely with a `MessageSubscriber`.
 */

/**
 * Processes one message at a time. Returns when the message is handled;
 * throws when it is not.
 */
export interface MessageHandler<T = unknown> {
  handleMessage(message: Message<T>): void;
}

/**
 * Processes a message asynchronously. The returned operation is the
 * completion signal for that message.
 */
export interface ReactiveMessageHandler<T = unknown> {
  handleMessage(message: Message<T>): Operation<void>;
}

/**
 * Start/stop capability of a component.
 */
export interface Lifecycle {
  start(): Operation<void>;
  stop(): Operation<void>;
  isRunning(): boolean;
}

/**
 * A handler that forwards its results to an output channel.
 */
export interface MessageProducer {
  readonly outputChannel: MessageChannel | undefined;
}

/**
 * A handler that picks a channel per message, falling back to a default.
 */
export interface MessageRouter {
  readonly defaultOutputChannel: MessageChannel | undefined;
}

/**
 * Upstream side of a subscription as seen by a subscriber: how many more
 * messages it wants, and a way to stop.
 */
export interface Demand {
  /** Authorise `n` more messages. `Infinity` means unbounded. */
  request(n: number): void;
  cancel(): void;
}

/**
 * Pull-side consumer of a message stream.
 */
export interface MessageSubscriber<T = unknown> {
  onSubscribe(demand: Demand): void;
  onNext(message: Message<T>): void;
  onError(error: Error): void;
  onComplete(): void;
}

/**
 * Selects the processing strategy of a consumer endpoint. Chosen once by
 * the caller; the endpoint never switches.
 */
export type ConsumerHandler<T = unknown> =
  | {
      kind: "handler";
      handler: MessageHandler<T>;
      lifecycle?: Lifecycle;
    }
  | {
      kind: "subscriber";
      subscriber: MessageSubscriber<T>;
      /** Exposed as the endpoint's handler when given */
      handler?: MessageHandler<T>;
      lifecycle?: Lifecycle;
    }
  | {
      kind: "reactive";
      handler: ReactiveMessageHandler<T>;
      lifecycle?: Lifecycle;
    };
