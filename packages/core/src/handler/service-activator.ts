import type { Message } from "../types/message.ts";
import type { MessageChannel } from "../types/channel.ts";
import type { MessageHandler, MessageProducer } from "../types/handler.ts";
import { createReply } from "../message/create.ts";
import { MessageDeliveryError } from "../errors/errors.ts";

export interface ServiceActivatorOptions<R> {
  /** Where results are sent. Without one, results are discarded. */
  outputChannel?: MessageChannel<R>;
}

export type ServiceActivator<T, R> = MessageHandler<T> &
  MessageProducer & { readonly outputChannel: MessageChannel<R> | undefined };

/**
 * Creates a handler that invokes `service` with each payload and sends the
 * result, if any, to the output channel as a reply to the incoming message.
 *
 * @example
 * ```ts
 * const totals = createSubscribableChannel<number>("totals");
 * const handler = createServiceActivator(
 *   (order: Order) => order.lines.reduce((sum, line) => sum + line.amount, 0),
 *   { outputChannel: totals },
 * );
 * ```
 */
export function createServiceActivator<T, R>(
  service: (payload: T, message: Message<T>) => R | undefined,
  options: ServiceActivatorOptions<R> = {},
): ServiceActivator<T, R> {
  const { outputChannel } = options;

  return {
    outputChannel,
    handleMessage(message) {
      const result = service(message.payload, message);
      if (result === undefined || outputChannel === undefined) {
        return;
      }
      if (!outputChannel.send(createReply(message, result))) {
        throw new MessageDeliveryError(outputChannel.name, "reply was not accepted", message);
      }
    },
  };
}
