import type { Operation } from "effection";
import type { LoggerFactory } from "./types.ts";
import { LoggerFactoryContext } from "./context.ts";
import { createPinoLoggerFactory, type PinoLoggerOptions } from "./pino-logger.ts";

/**
 * Install pino logging for the current scope and every endpoint started
 * below it.
 *
 * @example
 * ```ts
 * await main(function* () {
 *   yield* setupLogger({ level: "debug" });
 *   yield* useConsumerEndpoint(orders, { kind: "handler", handler: shipping });
 *   yield* suspend();
 * });
 * ```
 */
export function* setupLogger(options?: PinoLoggerOptions): Operation<void> {
  yield* LoggerFactoryContext.set(createPinoLoggerFactory(options));
}

/**
 * An installer for a factory of your own, in the shape of `setupLogger`.
 */
export function createLoggerSetup(factory: LoggerFactory): () => Operation<void> {
  return function* () {
    yield* LoggerFactoryContext.set(factory);
  };
}
