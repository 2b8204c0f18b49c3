/**
 * Pumps
 *
 * The loops that move messages from a producer subscription into a
 * subscriber (one at a time, under demand) or into a reactive handler
 * (concurrently, one task per message).
 */
import { all, race, spawn, withResolvers } from "effection";
import type { Operation, Subscription, Task } from "effection";
import type { Message } from "../types/message.ts";
import type {
  Demand,
  MessageSubscriber,
  ReactiveMessageHandler,
} from "../types/handler.ts";
import type { UpstreamErrorPolicy } from "../types/schemas.ts";
import type { ErrorHandler } from "../errors/handler.ts";
import type { Logger } from "../logger/types.ts";
import { toError, wrapHandlingError } from "../errors/errors.ts";

type Next<T> = IteratorResult<Message<T>, void>;

export interface SubscriberPumpOptions {
  /** Receives per-message failures. Must not throw. */
  report: ErrorHandler;
  upstreamErrors: UpstreamErrorPolicy;
  log: Logger;
}

/**
 * Drive a subscriber from a producer subscription.
 *
 * Messages are pulled only while the subscriber has requested more than it
 * has received. A failure thrown by `onNext` is reported with the failed
 * message and the loop continues. The loop ends when the producer completes
 * (after `onComplete`), when it fails (after `onError`), or when the
 * subscriber cancels.
 */
export function* pumpSubscriber<T>(
  upstream: Subscription<Message<T>, void>,
  subscriber: MessageSubscriber<T>,
  options: SubscriberPumpOptions,
): Operation<void> {
  const { report, upstreamErrors, log } = options;

  let requested = 0;
  let cancelled = false;
  let invalidRequest: Error | undefined;
  let wake: (() => void) | undefined;
  const cancellation = withResolvers<Next<T>>();

  const notify = () => {
    const resolve = wake;
    wake = undefined;
    resolve?.();
  };

  const demand: Demand = {
    request(n) {
      if (cancelled) return;
      if (!(n > 0)) {
        invalidRequest = new RangeError(`Demand must be positive, got ${n}`);
        demand.cancel();
        return;
      }
      requested += n;
      notify();
    },
    cancel() {
      if (cancelled) return;
      cancelled = true;
      notify();
      cancellation.resolve({ done: true, value: undefined });
    },
  };

  const guarded = (callback: () => void) => {
    try {
      callback();
    } catch (error) {
      report(toError(error));
    }
  };

  guarded(() => subscriber.onSubscribe(demand));
  log.debug("subscriber subscribed");

  while (!cancelled) {
    if (requested <= 0) {
      const { operation, resolve } = withResolvers<void>();
      wake = resolve;
      yield* operation;
      continue;
    }

    let next: Next<T>;
    try {
      next = yield* race([upstream.next(), cancellation.operation]);
    } catch (error) {
      const failure = toError(error);
      guarded(() => subscriber.onError(failure));
      if (upstreamErrors === "report") {
        report(failure);
      } else {
        log.debug({ err: failure }, "upstream failed");
      }
      return;
    }

    if (cancelled) break;

    if (next.done) {
      log.debug("upstream complete");
      guarded(() => subscriber.onComplete());
      return;
    }

    requested -= 1;
    const message = next.value;
    try {
      subscriber.onNext(message);
    } catch (error) {
      report(wrapHandlingError(message, error));
    }
  }

  if (invalidRequest) {
    const failure = invalidRequest;
    guarded(() => subscriber.onError(failure));
  }
  log.debug("subscription cancelled");
}

export interface ReactivePumpOptions {
  /** Receives per-message and upstream failures. Must not throw. */
  report: ErrorHandler;
  /** Most completions in flight at once */
  concurrency: number;
  log: Logger;
}

/**
 * Map every message through a reactive handler, concurrently.
 *
 * Each completion runs in its own task; a failed completion is reported
 * with its message and does not affect the others. When the producer
 * completes, the pump waits for the completions still in flight.
 */
export function* pumpReactive<T>(
  upstream: Subscription<Message<T>, void>,
  handler: ReactiveMessageHandler<T>,
  options: ReactivePumpOptions,
): Operation<void> {
  const { report, concurrency, log } = options;
  const inflight = new Map<symbol, Task<void>>();
  let slotFreed: (() => void) | undefined;

  const release = () => {
    const resolve = slotFreed;
    slotFreed = undefined;
    resolve?.();
  };

  try {
    for (;;) {
      while (inflight.size >= concurrency) {
        const { operation, resolve } = withResolvers<void>();
        slotFreed = resolve;
        yield* operation;
      }

      const next = yield* upstream.next();
      if (next.done) break;

      const message = next.value;
      const key = Symbol(message.headers.id);
      let settled = false;

      const task = yield* spawn(function* () {
        try {
          yield* handler.handleMessage(message);
        } catch (error) {
          report(wrapHandlingError(message, error));
        } finally {
          settled = true;
          inflight.delete(key);
          release();
        }
      });

      // A completion that finished synchronously has already removed itself
      if (!settled) {
        inflight.set(key, task);
      }
    }
    log.debug("upstream complete");
  } catch (error) {
    report(toError(error));
  }

  if (inflight.size > 0) {
    log.debug({ inflight: inflight.size }, "waiting for in-flight completions");
    yield* all([...inflight.values()]);
  }
}
