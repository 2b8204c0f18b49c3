export {
  MessagingError,
  MessageHandlingError,
  MessageDeliveryError,
  EndpointConfigurationError,
  toError,
  wrapHandlingError,
} from "./errors.ts";
export {
  ErrorHandlerContext,
  createLoggingErrorHandler,
  createMessagePublishingErrorHandler,
  useErrorHandler,
  type ErrorHandler,
  type MessagePublishingErrorHandlerOptions,
} from "./handler.ts";
