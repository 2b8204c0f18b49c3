import type { Logger } from "./types.ts";

const discard = (): void => {};

const NOOP_LOGGER: Logger = Object.freeze({
  trace: discard,
  debug: discard,
  info: discard,
  warn: discard,
  error: discard,
  child: () => NOOP_LOGGER,
});

/**
 * The logger `useLogger` hands out when no factory is installed. Writes
 * nothing; its children are itself.
 */
export function createNoopLogger(): Logger {
  return NOOP_LOGGER;
}
