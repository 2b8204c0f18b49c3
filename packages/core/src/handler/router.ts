import type { Message } from "../types/message.ts";
import type { MessageChannel } from "../types/channel.ts";
import type { MessageHandler, MessageRouter } from "../types/handler.ts";
import { MessageDeliveryError } from "../errors/errors.ts";

export interface RouterOptions<T> {
  /** Channels the selector can name */
  channels: Record<string, MessageChannel<T>>;
  /** Used when the selector returns no name or an unknown one */
  defaultOutputChannel?: MessageChannel<T>;
}

export type Router<T> = MessageHandler<T> &
  MessageRouter & { readonly defaultOutputChannel: MessageChannel<T> | undefined };

/**
 * Creates a handler that forwards each message, unchanged, to the channel
 * `selector` names.
 *
 * @example
 * ```ts
 * const router = createRouter((message: Message<Order>) => message.payload.region, {
 *   channels: { eu: euOrders, us: usOrders },
 *   defaultOutputChannel: unrouted,
 * });
 * ```
 */
export function createRouter<T>(
  selector: (message: Message<T>) => string | undefined,
  options: RouterOptions<T>,
): Router<T> {
  const { channels, defaultOutputChannel } = options;

  return {
    defaultOutputChannel,
    handleMessage(message) {
      const key = selector(message);
      const target =
        (key !== undefined && Object.hasOwn(channels, key) ? channels[key] : undefined) ??
        defaultOutputChannel;
      if (!target) {
        throw new MessageDeliveryError(
          key ?? "<unresolved>",
          "no channel resolved and no default output channel",
          message,
        );
      }
      if (!target.send(message)) {
        throw new MessageDeliveryError(target.name, "message was not accepted", message);
      }
    },
  };
}
