import { describe, it, expect } from "../../__tests__/vitest-effection.ts";
import { spawn, suspend, withResolvers } from "effection";
import type { ConsumerEndpoint } from "../consumer.ts";
import { createSubscribableChannel } from "../../channel/subscribable.ts";
import { createMessage } from "../../message/create.ts";
import { useConsumerEndpoint } from "../resource.ts";

describe("useConsumerEndpoint", () => {
  it("should start on acquisition and stop when the scope exits", function* () {
    const channel = createSubscribableChannel<string>("events");
    const received = withResolvers<string>();
    const acquired = withResolvers<ConsumerEndpoint<string>>();

    const owner = yield* spawn(function* () {
      const endpoint = yield* useConsumerEndpoint(channel, {
        kind: "handler",
        handler: { handleMessage: (message) => received.resolve(message.payload) },
      });
      acquired.resolve(endpoint);
      yield* suspend();
    });

    const endpoint = yield* acquired.operation;
    expect(endpoint.isRunning()).toBe(true);
    expect(channel.subscriberCount()).toBe(1);

    channel.send(createMessage("hello"));
    expect(yield* received.operation).toBe("hello");

    yield* owner.halt();
    expect(endpoint.state()).toBe("stopped");
    expect(channel.subscriberCount()).toBe(0);
  });

  it("should leave the endpoint stopped without autoStartup", function* () {
    const channel = createSubscribableChannel<string>("events");

    const endpoint = yield* useConsumerEndpoint(
      channel,
      { kind: "handler", handler: { handleMessage() {} } },
      { autoStartup: false },
    );

    expect(endpoint.autoStartup).toBe(false);
    expect(endpoint.isRunning()).toBe(false);
    expect(channel.subscriberCount()).toBe(0);

    yield* endpoint.start();
    expect(channel.subscriberCount()).toBe(1);
  });
});
