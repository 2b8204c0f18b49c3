import type { MessageChannel } from "../types/channel.ts";
import type { MessageProducer, MessageRouter } from "../types/handler.ts";

export function isMessageProducer(handler: object): handler is MessageProducer {
  return "outputChannel" in handler;
}

export function isMessageRouter(handler: object): handler is MessageRouter {
  return "defaultOutputChannel" in handler;
}

/**
 * The channel a handler forwards to, if it declares one: a producer's output
 * channel, or a router's default output channel.
 */
export function outputChannelOf(handler: object): MessageChannel | undefined {
  if (isMessageProducer(handler)) {
    return handler.outputChannel;
  }
  if (isMessageRouter(handler)) {
    return handler.defaultOutputChannel;
  }
  return undefined;
}
