/**
 * The logging surface every module writes to. pino's logger satisfies it, so
 * does the no-op logger and any in-memory recorder a test installs.
 *
 * Namespaces in use: `endpoint:consumer`, `endpoint:pump`,
 * `channel:producer`, `errors:handler`.
 */

/** Structured fields attached to every line a logger writes */
export type LogBindings = Record<string, unknown>;

/** One level: a bare message, or fields followed by a message */
export interface LogMethod {
  (msg: string, ...args: unknown[]): void;
  (fields: object, msg?: string, ...args: unknown[]): void;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  /** A logger whose lines also carry `bindings` */
  child(bindings: LogBindings): Logger;
}

/** Builds the logger for a namespace */
export type LoggerFactory = (namespace: string) => Logger;
