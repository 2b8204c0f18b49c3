/**
 * Consumer Endpoint
 *
 * Subscribes a handler to an input channel through the producer adapter and
 * owns the resulting subscription. The endpoint runs in one of two modes,
 * fixed at construction:
 *
 * - subscriber mode: messages are pulled under the subscriber's demand and
 *   handled one at a time
 * - reactive mode: every message is mapped to a completion signal and the
 *   completions run concurrently
 *
 * In both modes a failed message goes to the error handler and consumption
 * continues. Only `stop()` or the end of the input channel ends it.
 */
import { call, createScope, withResolvers } from "effection";
import type { Operation } from "effection";
import type { Message } from "../types/message.ts";
import type { InputChannel, MessageChannel } from "../types/channel.ts";
import type {
  ConsumerHandler,
  Lifecycle,
  MessageHandler,
  MessageSubscriber,
  ReactiveMessageHandler,
} from "../types/handler.ts";
import {
  ConsumerOptionsSchema,
  type ConsumerOptions,
  type ResolvedConsumerOptions,
} from "../types/schemas.ts";
import { EndpointConfigurationError, toError } from "../errors/errors.ts";
import { useErrorHandler, type ErrorHandler } from "../errors/handler.ts";
import { LoggerFactoryContext, useLogger } from "../logger/index.ts";
import type { Logger } from "../logger/types.ts";
import { toProducer } from "../channel/producer.ts";
import { outputChannelOf } from "../handler/introspection.ts";
import { createMessageHandlerSubscriber } from "./subscriber.ts";
import { pumpReactive, pumpSubscriber } from "./pump.ts";

export type EndpointState = "created" | "initialized" | "running" | "stopped";

/**
 * The live subscription of a running endpoint.
 */
export interface SubscriptionHandle {
  /** Tear the subscription down. Safe to call more than once. */
  dispose(): Operation<void>;
  isDisposed(): boolean;
  /**
   * Wait until the subscription ends by itself: the input channel completed,
   * or the subscriber cancelled. Returns immediately once disposed.
   */
  closed(): Operation<void>;
}

export interface ConsumerEndpoint<T = unknown> extends Lifecycle {
  readonly name: string;
  readonly mode: "subscriber" | "reactive";
  readonly inputChannel: InputChannel<T>;
  /** The handler messages are dispatched to */
  readonly handler: MessageHandler<T> | ReactiveMessageHandler<T>;
  /** Where the handler forwards to, when it declares it */
  readonly outputChannel: MessageChannel | undefined;
  readonly autoStartup: boolean;
  /** Replace the error handler. Takes effect for the next failure. */
  setErrorHandler(errorHandler: ErrorHandler): void;
  /** Resolve the error handler from the current scope if none was set. */
  init(): Operation<void>;
  state(): EndpointState;
  subscription(): SubscriptionHandle | undefined;
}

type Selection<T> =
  | {
      mode: "subscriber";
      subscriber: MessageSubscriber<T>;
      handler: MessageHandler<T>;
      lifecycle: Lifecycle | undefined;
    }
  | {
      mode: "reactive";
      handler: ReactiveMessageHandler<T>;
      lifecycle: Lifecycle | undefined;
    };

function select<T>(consumer: ConsumerHandler<T>): Selection<T> {
  switch (consumer.kind) {
    case "handler": {
      const subscriber = createMessageHandlerSubscriber(consumer.handler, consumer.lifecycle);
      return {
        mode: "subscriber",
        subscriber,
        handler: consumer.handler,
        lifecycle: subscriber,
      };
    }
    case "subscriber": {
      const { subscriber } = consumer;
      return {
        mode: "subscriber",
        subscriber,
        handler: consumer.handler ?? {
          handleMessage: (message: Message<T>) => subscriber.onNext(message),
        },
        lifecycle: consumer.lifecycle,
      };
    }
    case "reactive":
      return {
        mode: "reactive",
        handler: consumer.handler,
        lifecycle: consumer.lifecycle,
      };
  }
}

function parseOptions(options: ConsumerOptions): ResolvedConsumerOptions {
  const parsed = ConsumerOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new EndpointConfigurationError(`Invalid consumer options: ${issues}`);
  }
  return parsed.data;
}

/**
 * Create a consumer endpoint for `inputChannel`.
 *
 * The endpoint is created stopped. `start()` subscribes, `stop()` disposes
 * the subscription and then stops the handler's lifecycle, if it has one.
 * Overlapping calls run one after the other: a `start()` issued while another
 * is pending returns once that one has, and a `stop()` waits for it before
 * tearing the subscription down.
 *
 * @param inputChannel - The channel to consume
 * @param consumer - How messages are processed; see {@link ConsumerHandler}
 * @param options - Validated with {@link ConsumerOptionsSchema}
 *
 * @example
 * ```ts
 * const orders = createSubscribableChannel<Order>("orders");
 * const endpoint = yield* createConsumerEndpoint(orders, {
 *   kind: "handler",
 *   handler: { handleMessage: (message) => ship(message.payload) },
 * });
 * yield* endpoint.start();
 * orders.send(createMessage(order));
 * yield* endpoint.stop();
 * ```
 */
export function* createConsumerEndpoint<T>(
  inputChannel: InputChannel<T>,
  consumer: ConsumerHandler<T>,
  options: ConsumerOptions = {},
): Operation<ConsumerEndpoint<T>> {
  if (!inputChannel) {
    throw new EndpointConfigurationError("'inputChannel' must not be null");
  }
  if (!consumer) {
    throw new EndpointConfigurationError("'consumer' must not be null");
  }
  const resolved = parseOptions(options);
  const selection = select(consumer);
  const name = resolved.name ?? `${inputChannel.name}.consumer`;

  const log = yield* useLogger("endpoint:consumer", { endpoint: name });

  if (inputChannel.kind === "null") {
    log.warn(
      "Consuming from the null channel has no effect: it does not forward the messages " +
        "sent to it. The null channel is the end of a flow.",
    );
  }

  let state: EndpointState = "created";
  let errorHandler: ErrorHandler | undefined = resolved.errorHandler;
  let handle: SubscriptionHandle | undefined;

  const report: ErrorHandler = (error) => {
    const target = errorHandler;
    if (!target) {
      log.error({ err: error }, "no error handler resolved");
      return;
    }
    try {
      target(error);
    } catch (failure) {
      log.error({ err: toError(failure), original: error.message }, "error handler failed");
    }
  };

  function* subscribe(): Operation<SubscriptionHandle> {
    const loggerFactory = yield* LoggerFactoryContext.get();
    const ready = withResolvers<void>();
    let subscribed = false;
    let disposed = false;

    // Independent scope: start() returns while the subscription keeps running
    const [scope, destroy] = createScope();

    const task = scope.run(function* () {
      if (loggerFactory) {
        yield* LoggerFactoryContext.set(loggerFactory);
      }
      const pumpLog: Logger = yield* useLogger("endpoint:pump", { endpoint: name });
      try {
        const upstream = yield* toProducer(inputChannel);
        subscribed = true;
        ready.resolve();

        if (selection.mode === "reactive") {
          yield* pumpReactive(upstream, selection.handler, {
            report,
            concurrency: resolved.concurrency,
            log: pumpLog,
          });
        } else {
          yield* pumpSubscriber(upstream, selection.subscriber, {
            report,
            upstreamErrors: resolved.upstreamErrors,
            log: pumpLog,
          });
        }
      } catch (error) {
        if (subscribed) {
          report(toError(error));
        } else {
          ready.reject(toError(error));
        }
      }
    });

    const subscription: SubscriptionHandle = {
      *dispose() {
        if (disposed) return;
        disposed = true;
        yield* call(() => destroy());
        log.debug("subscription disposed");
      },
      isDisposed: () => disposed,
      *closed() {
        if (disposed) return;
        try {
          yield* task;
        } catch (error) {
          if (!disposed) throw error;
        }
      },
    };

    let live = false;
    try {
      yield* ready.operation;
      live = true;
      return subscription;
    } finally {
      if (!live) {
        yield* subscription.dispose();
      }
    }
  }

  // The start or stop in progress; the next one waits for it to settle
  let transition: Operation<void> | undefined;

  function* exclusive(body: () => Operation<void>): Operation<void> {
    while (transition) {
      yield* transition;
    }
    const settled = withResolvers<void>();
    transition = settled.operation;
    try {
      yield* body();
    } finally {
      transition = undefined;
      settled.resolve();
    }
  }

  const endpoint: ConsumerEndpoint<T> = {
    name,
    mode: selection.mode,
    inputChannel,
    handler: selection.handler,
    outputChannel: outputChannelOf(selection.handler),
    autoStartup: resolved.autoStartup,

    setErrorHandler(next) {
      errorHandler = next;
    },

    *init() {
      if (state !== "created") return;
      if (!errorHandler) {
        errorHandler = yield* useErrorHandler();
      }
      state = "initialized";
      log.debug({ mode: selection.mode }, "endpoint initialized");
    },

    *start() {
      yield* exclusive(function* () {
        if (state === "running") return;
        yield* endpoint.init();

        const { lifecycle } = selection;
        if (lifecycle) {
          yield* lifecycle.start();
        }
        let subscribed = false;
        try {
          handle = yield* subscribe();
          subscribed = true;
        } finally {
          if (!subscribed && lifecycle) {
            yield* lifecycle.stop();
          }
        }
        state = "running";
        log.debug({ channel: inputChannel.name }, "endpoint started");
      });
    },

    *stop() {
      yield* exclusive(function* () {
        if (state !== "running") return;
        state = "stopped";
        const current = handle;
        handle = undefined;
        if (current) {
          yield* current.dispose();
        }
        if (selection.lifecycle) {
          yield* selection.lifecycle.stop();
        }
        log.debug({ channel: inputChannel.name }, "endpoint stopped");
      });
    },

    isRunning: () => state === "running",
    state: () => state,
    subscription: () => handle,
  };

  return endpoint;
}
