import { randomUUID } from "node:crypto";
import type { ErrorMessage, Message, MessageHeaders } from "../types/message.ts";

/**
 * Build a message. `id` and `timestamp` are generated unless supplied.
 *
 * @example
 * ```ts
 * const message = createMessage({ orderId: 42 }, { priority: "high" });
 * message.headers.priority; // "high"
 * ```
 */
export function createMessage<T>(
  payload: T,
  headers: Record<string, unknown> = {},
): Message<T> {
  const merged: MessageHeaders = {
    ...headers,
    id: typeof headers["id"] === "string" ? headers["id"] : randomUUID(),
    timestamp: typeof headers["timestamp"] === "number" ? headers["timestamp"] : Date.now(),
  };
  return Object.freeze({ payload, headers: Object.freeze(merged) });
}

/**
 * Build a reply to `request`: the request headers are copied, except for
 * `id` and `timestamp`, which are new.
 */
export function createReply<T>(request: Message, payload: T): Message<T> {
  const { id: _id, timestamp: _timestamp, ...rest } = request.headers;
  return createMessage(payload, rest);
}

/**
 * Wrap a failure for publication on an error channel.
 */
export function createErrorMessage(error: Error, originalMessage?: Message): ErrorMessage {
  const message = createMessage(error);
  return Object.freeze({ ...message, originalMessage });
}
