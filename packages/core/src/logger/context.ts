import { createContext, type Operation } from "effection";
import type { LogBindings, Logger, LoggerFactory } from "./types.ts";
import { createNoopLogger } from "./noop-logger.ts";

/**
 * The logger factory of the current scope. Endpoints read it when they are
 * created and carry it into the scope each subscription runs in.
 */
export const LoggerFactoryContext = createContext<LoggerFactory>("pushpull.logger-factory");

/**
 * The logger for `namespace` in the current scope, bound to `bindings` when
 * given. Logs nothing until a factory is installed with `setupLogger()` or
 * `createLoggerSetup()`.
 *
 * @example
 * ```ts
 * const log = yield* useLogger("endpoint:consumer", { endpoint: "orders.consumer" });
 * log.debug({ channel: "orders" }, "endpoint started");
 * ```
 */
export function* useLogger(namespace: string, bindings?: LogBindings): Operation<Logger> {
  const factory = yield* LoggerFactoryContext.get();
  const log = factory ? factory(namespace) : createNoopLogger();
  return bindings ? log.child(bindings) : log;
}
