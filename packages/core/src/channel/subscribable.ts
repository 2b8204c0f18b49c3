import type { MessageReceiver, SubscribableChannel } from "../types/channel.ts";
import { MessageDeliveryError, toError } from "../errors/errors.ts";

export interface SubscribableChannelOptions {
  /**
   * Fewest receivers `send()` accepts. With fewer registered it throws
   * instead of dropping the message. Defaults to 0.
   */
  minSubscribers?: number;
}

/**
 * Creates a push channel.
 *
 * `send()` calls every registered receiver, in registration order, before it
 * returns. A receiver that throws aborts the send and the failure surfaces to
 * the sender as a `MessageDeliveryError`.
 *
 * @example
 * ```ts
 * const orders = createSubscribableChannel<Order>("orders");
 * const unsubscribe = orders.subscribe((message) => audit(message.payload));
 * orders.send(createMessage(order));
 * unsubscribe();
 * ```
 */
export function createSubscribableChannel<T = unknown>(
  name: string,
  options: SubscribableChannelOptions = {},
): SubscribableChannel<T> {
  const { minSubscribers = 0 } = options;
  // Wrapped per registration so the same function can subscribe twice
  const receivers = new Set<MessageReceiver<T>>();
  const closeListeners = new Set<(error?: Error) => void>();
  let closed = false;
  let closeError: Error | undefined;

  return {
    kind: "subscribable",
    name,

    send(message) {
      if (closed) {
        throw new MessageDeliveryError(name, "channel is closed", message);
      }
      if (receivers.size < minSubscribers) {
        throw new MessageDeliveryError(
          name,
          `${receivers.size} subscriber(s) registered, at least ${minSubscribers} required`,
          message,
        );
      }
      for (const receiver of [...receivers]) {
        try {
          receiver(message);
        } catch (error) {
          throw new MessageDeliveryError(name, toError(error).message, message, {
            cause: error,
          });
        }
      }
      return true;
    },

    subscribe(receiver) {
      const registration: MessageReceiver<T> = (message) => receiver(message);
      receivers.add(registration);
      return () => {
        receivers.delete(registration);
      };
    },

    subscriberCount: () => receivers.size,

    onClose(listener) {
      if (closed) {
        listener(closeError);
        return () => {};
      }
      const registration = (error?: Error) => listener(error);
      closeListeners.add(registration);
      return () => {
        closeListeners.delete(registration);
      };
    },

    isClosed: () => closed,

    close(error) {
      if (closed) return;
      closed = true;
      closeError = error;
      const listeners = [...closeListeners];
      closeListeners.clear();
      for (const listener of listeners) {
        listener(error);
      }
    },
  };
}
