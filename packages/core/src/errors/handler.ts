/**
 * Error Handlers
 *
 * An error handler reports a failure without propagating it. Endpoints call
 * one for every message a handler failed to process, and keep consuming.
 */
import { createContext, type Operation } from "effection";
import type { MessageChannel } from "../types/channel.ts";
import type { Logger } from "../logger/types.ts";
import { createNoopLogger, useLogger } from "../logger/index.ts";
import { createErrorMessage } from "../message/create.ts";
import { MessagingError, toError } from "./errors.ts";

/**
 * Reports a failure. Must not throw; if it does, the caller logs and moves on.
 */
export type ErrorHandler = (error: Error) => void;

/**
 * Effection context for the error handler endpoints fall back to when none
 * was set explicitly.
 *
 * @example
 * ```ts
 * yield* ErrorHandlerContext.set(createMessagePublishingErrorHandler(errors));
 * // every endpoint started below this point publishes failures to `errors`
 * const endpoint = yield* useConsumerEndpoint(orders, handler);
 * ```
 */
export const ErrorHandlerContext = createContext<ErrorHandler>("pushpull.error-handler");

/**
 * Logs every failure at `error` level, with the id of the failed message
 * when there is one.
 */
export function createLoggingErrorHandler(log: Logger): ErrorHandler {
  return (error) => {
    if (error instanceof MessagingError && error.failedMessage) {
      log.error({ err: error, messageId: error.failedMessage.headers.id }, error.message);
    } else {
      log.error({ err: error }, error.message);
    }
  };
}

export interface MessagePublishingErrorHandlerOptions {
  /** Logger for failed publications (default: no-op) */
  log?: Logger;
  /**
   * Called when the error channel does not accept the error message
   * (default: a logging error handler on `log`)
   */
  fallback?: ErrorHandler;
}

/**
 * Publishes every failure as an `ErrorMessage` on `errorChannel`.
 *
 * If the channel throws or refuses the message, the failure goes to the
 * fallback instead.
 */
export function createMessagePublishingErrorHandler(
  errorChannel: MessageChannel<Error>,
  options: MessagePublishingErrorHandlerOptions = {},
): ErrorHandler {
  const { log = createNoopLogger(), fallback = createLoggingErrorHandler(log) } = options;

  return (error) => {
    const failedMessage = error instanceof MessagingError ? error.failedMessage : undefined;
    let sent = false;
    try {
      sent = errorChannel.send(createErrorMessage(error, failedMessage));
    } catch (sendError) {
      log.warn(
        { err: toError(sendError), channel: errorChannel.name },
        "failed to publish error message",
      );
    }
    if (!sent) {
      fallback(error);
    }
  };
}

/**
 * Resolve the error handler of the current scope: the one in
 * `ErrorHandlerContext`, or a logging error handler.
 */
export function* useErrorHandler(): Operation<ErrorHandler> {
  const contextual = yield* ErrorHandlerContext.get();
  if (contextual) {
    return contextual;
  }
  const log = yield* useLogger("errors:handler");
  return createLoggingErrorHandler(log);
}
