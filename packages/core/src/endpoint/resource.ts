import { resource, type Operation } from "effection";
import type { InputChannel } from "../types/channel.ts";
import type { ConsumerHandler } from "../types/handler.ts";
import type { ConsumerOptions } from "../types/schemas.ts";
import { createConsumerEndpoint, type ConsumerEndpoint } from "./consumer.ts";

/**
 * Create a consumer endpoint bound to the current scope.
 *
 * The endpoint is started on acquisition unless `autoStartup` is `false`,
 * and stopped when the scope exits.
 *
 * @example
 * ```ts
 * await main(function* () {
 *   yield* setupLogger();
 *   yield* useConsumerEndpoint(orders, { kind: "reactive", handler: fulfilment });
 *   yield* suspend();
 * });
 * ```
 */
export function useConsumerEndpoint<T>(
  inputChannel: InputChannel<T>,
  consumer: ConsumerHandler<T>,
  options: ConsumerOptions = {},
): Operation<ConsumerEndpoint<T>> {
  return resource(function* (provide) {
    const endpoint = yield* createConsumerEndpoint(inputChannel, consumer, options);
    if (endpoint.autoStartup) {
      yield* endpoint.start();
    }
    try {
      yield* provide(endpoint);
    } finally {
      yield* endpoint.stop();
    }
  });
}
