// Re-export all types
export * from "./types/index.ts";

// Re-export messages
export { createMessage, createReply, createErrorMessage } from "./message/index.ts";

// Re-export channels and the producer adapter
export {
  createSubscribableChannel,
  createQueueChannel,
  createNullChannel,
  toProducer,
  type SubscribableChannelOptions,
  type QueueChannelOptions,
} from "./channel/index.ts";

// Re-export handlers
export {
  createServiceActivator,
  createRouter,
  isMessageProducer,
  isMessageRouter,
  outputChannelOf,
  type ServiceActivator,
  type ServiceActivatorOptions,
  type Router,
  type RouterOptions,
} from "./handler/index.ts";

// Re-export endpoints
export {
  createConsumerEndpoint,
  useConsumerEndpoint,
  createMessageHandlerSubscriber,
  fromMessageHandlerSubscriber,
  pumpSubscriber,
  pumpReactive,
  type ConsumerEndpoint,
  type EndpointState,
  type SubscriptionHandle,
  type MessageHandlerSubscriber,
  type SubscriberPumpOptions,
  type ReactivePumpOptions,
} from "./endpoint/index.ts";

// Re-export errors and error handlers
export {
  MessagingError,
  MessageHandlingError,
  MessageDeliveryError,
  EndpointConfigurationError,
  toError,
  wrapHandlingError,
  ErrorHandlerContext,
  createLoggingErrorHandler,
  createMessagePublishingErrorHandler,
  useErrorHandler,
  type ErrorHandler,
  type MessagePublishingErrorHandlerOptions,
} from "./errors/index.ts";

// Re-export logging
export {
  LoggerFactoryContext,
  useLogger,
  createNoopLogger,
  createPinoLoggerFactory,
  setupLogger,
  createLoggerSetup,
  type Logger,
  type LogBindings,
  type LogMethod,
  type LoggerFactory,
  type PinoLoggerOptions,
} from "./logger/index.ts";
