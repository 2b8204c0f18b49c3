import { withResolvers } from "effection";
import type { Message } from "../types/message.ts";
import type { QueueChannel } from "../types/channel.ts";
import { MessageDeliveryError } from "../errors/errors.ts";

export interface QueueChannelOptions {
  /** Maximum buffered messages (default: unbounded) */
  capacity?: number;
}

/**
 * Creates a buffered channel.
 *
 * `send()` never blocks: it appends and returns `true`, or returns `false`
 * when the buffer is full. Consumers take messages with `receive()`.
 */
export function createQueueChannel<T = unknown>(
  name: string,
  options: QueueChannelOptions = {},
): QueueChannel<T> {
  const { capacity = Infinity } = options;
  const buffer: Message<T>[] = [];
  const waiters = new Set<() => void>();
  let closed = false;
  let closeError: Error | undefined;

  const wake = () => {
    for (const resolve of [...waiters]) {
      resolve();
    }
  };

  return {
    kind: "queue",
    name,
    capacity,

    send(message) {
      if (closed) {
        throw new MessageDeliveryError(name, "channel is closed", message);
      }
      if (buffer.length >= capacity) {
        return false;
      }
      buffer.push(message);
      wake();
      return true;
    },

    *receive() {
      for (;;) {
        const next = buffer.shift();
        if (next !== undefined) {
          return next;
        }
        if (closed) {
          if (closeError) throw closeError;
          return undefined;
        }
        const { operation, resolve } = withResolvers<void>();
        waiters.add(resolve);
        try {
          yield* operation;
        } finally {
          waiters.delete(resolve);
        }
      }
    },

    size: () => buffer.length,
    isClosed: () => closed,

    close(error) {
      if (closed) return;
      closed = true;
      closeError = error;
      wake();
    },
  };
}
