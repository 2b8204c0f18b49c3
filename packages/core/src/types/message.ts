/**
 * Message types.
 *
 * A message is an immutable payload plus headers. Channels move messages,
 * handlers consume them; neither ever mutates one.
 */

/**
 * Headers carried by every message.
 *
 * `id` and `timestamp` are always present. Anything else is application data.
 */
export interface MessageHeaders {
  readonly id: string;
  readonly timestamp: number;
  readonly [key: string]: unknown;
}

/**
 * The unit moved through channels.
 */
export interface Message<T = unknown> {
  readonly payload: T;
  readonly headers: MessageHeaders;
}

/**
 * A message whose payload is a failure, published by the error-channel
 * error handler. `originalMessage` is the message that was being processed,
 * when it is known.
 */
export interface ErrorMessage extends Message<Error> {
  readonly originalMessage?: Message;
}
