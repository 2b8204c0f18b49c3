import type { Message } from "../types/message.ts";

// =============================================================================
// Error Types
// =============================================================================

export class MessagingError extends Error {
  constructor(
    message: string,
    public readonly failedMessage?: Message,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "MessagingError";
  }
}

/**
 * A handler failed while processing `failedMessage`. The handler's own
 * failure is the `cause`.
 */
export class MessageHandlingError extends MessagingError {
  constructor(failedMessage: Message, cause: Error) {
    super(
      `Failed to handle message ${failedMessage.headers.id}: ${cause.message}`,
      failedMessage,
      { cause },
    );
    this.name = "MessageHandlingError";
  }
}

export class MessageDeliveryError extends MessagingError {
  constructor(
    public readonly channelName: string,
    reason: string,
    failedMessage?: Message,
    options?: { cause?: unknown },
  ) {
    super(`Failed to send to channel '${channelName}': ${reason}`, failedMessage, options);
    this.name = "MessageDeliveryError";
  }
}

export class EndpointConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EndpointConfigurationError";
  }
}

/**
 * Normalise anything thrown into an `Error`.
 */
export function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}

/**
 * Attach the failed message to a handler failure, unless it already carries
 * one.
 */
export function wrapHandlingError(message: Message, thrown: unknown): Error {
  const error = toError(thrown);
  if (error instanceof MessagingError && error.failedMessage !== undefined) {
    return error;
  }
  return new MessageHandlingError(message, error);
}
