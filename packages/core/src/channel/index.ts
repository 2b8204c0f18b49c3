export { createSubscribableChannel, type SubscribableChannelOptions } from "./subscribable.ts";
export { createQueueChannel, type QueueChannelOptions } from "./queue.ts";
export { createNullChannel } from "./null.ts";
export { toProducer } from "./producer.ts";
