export {
  createConsumerEndpoint,
  type ConsumerEndpoint,
  type EndpointState,
  type SubscriptionHandle,
} from "./consumer.ts";
export { useConsumerEndpoint } from "./resource.ts";
export {
  createMessageHandlerSubscriber,
  fromMessageHandlerSubscriber,
  type MessageHandlerSubscriber,
} from "./subscriber.ts";
export {
  pumpSubscriber,
  pumpReactive,
  type SubscriberPumpOptions,
  type ReactivePumpOptions,
} from "./pump.ts";
