import type { Operation } from "effection";
import type { Message } from "./message.ts";

/**
 * Channel types.
 *
 * Every channel accepts `send()`; how the message reaches a consumer depends
 * on the kind. The `kind` discriminator is what the producer adapter switches
 * on.
 */

/**
 * Anything a message can be sent to.
 */
export interface MessageChannel<T = unknown> {
  readonly name: string;
  /**
   * Deliver a message. Returns `false` when the channel refused it
   * (e.g. a full queue).
   */
  send(message: Message<T>): boolean;
}

/**
 * A receiver registered on a subscribable channel. Invoked synchronously by
 * `send()`.
 */
export type MessageReceiver<T> = (message: Message<T>) => void;

/**
 * Push channel: `send()` invokes every subscribed receiver before it returns.
 */
export interface SubscribableChannel<T = unknown> extends MessageChannel<T> {
  readonly kind: "subscribable";
  /** Register a receiver. Returns the function that removes it. */
  subscribe(receiver: MessageReceiver<T>): () => void;
  /** Number of registered receivers */
  subscriberCount(): number;
  /**
   * Register a listener called once when the channel closes, with the error
   * it was closed with, if any. On a closed channel the listener runs at
   * once.
   */
  onClose(listener: (error?: Error) => void): () => void;
  isClosed(): boolean;
  /** Close the channel. Closing with an error fails subscribed producers. */
  close(error?: Error): void;
}

/**
 * Buffered channel: `send()` appends, `receive()` takes.
 */
export interface QueueChannel<T = unknown> extends MessageChannel<T> {
  readonly kind: "queue";
  readonly capacity: number;
  /**
   * Wait for the next message. Resolves `undefined` once the channel is
   * closed and drained, or throws the error it was closed with.
   */
  receive(): Operation<Message<T> | undefined>;
  size(): number;
  isClosed(): boolean;
  close(error?: Error): void;
}

/**
 * The end of a flow: accepts everything, forwards nothing.
 */
export interface NullChannel extends MessageChannel<unknown> {
  readonly kind: "null";
}

/**
 * The channels a consumer endpoint can subscribe to.
 */
export type InputChannel<T = unknown> =
  | SubscribableChannel<T>
  | QueueChannel<T>
  | NullChannel;
