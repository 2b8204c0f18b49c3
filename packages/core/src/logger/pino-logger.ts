import pino from "pino";
import type { Logger, LoggerFactory } from "./types.ts";

export interface PinoLoggerOptions {
  /** Minimum level written. Falls back to `LOG_LEVEL`, then `info`. */
  level?: string;
  /** Human-readable output through pino-pretty. Off when `NODE_ENV` is `production`. */
  pretty?: boolean;
  /** `name` field of every line (default: `pushpull`) */
  name?: string;
}

/**
 * A factory of pino loggers sharing one root. Each namespace becomes the
 * `module` field of the lines its logger writes.
 *
 * @example
 * ```ts
 * const factory = createPinoLoggerFactory({ level: "debug", pretty: false });
 * factory("channel:producer").debug({ channel: "orders" }, "producer subscribed");
 * ```
 */
export function createPinoLoggerFactory(options: PinoLoggerOptions = {}): LoggerFactory {
  const {
    level = process.env["LOG_LEVEL"] || "info",
    pretty = process.env["NODE_ENV"] !== "production",
    name = "pushpull",
  } = options;

  const root = pino({
    name,
    level,
    ...(pretty ? { transport: { target: "pino-pretty", options: { colorize: true } } } : {}),
  });

  return (namespace) => root.child({ module: namespace }) as Logger;
}
