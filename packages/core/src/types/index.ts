export type { Message, MessageHeaders, ErrorMessage } from "./message.ts";
export type {
  MessageChannel,
  MessageReceiver,
  SubscribableChannel,
  QueueChannel,
  NullChannel,
  InputChannel,
} from "./channel.ts";
export type {
  MessageHandler,
  ReactiveMessageHandler,
  Lifecycle,
  MessageProducer,
  MessageRouter,
  Demand,
  MessageSubscriber,
  ConsumerHandler,
} from "./handler.ts";
export {
  ConsumerOptionsSchema,
  UpstreamErrorPolicySchema,
  type ConsumerOptions,
  type ResolvedConsumerOptions,
  type UpstreamErrorPolicy,
} from "./schemas.ts";
