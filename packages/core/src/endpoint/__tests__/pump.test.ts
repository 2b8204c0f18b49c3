import { describe, it, expect } from "../../__tests__/vitest-effection.ts";
import { sleep } from "effection";
import type { Operation, Subscription } from "effection";
import type { Message } from "../../types/message.ts";
import type { Demand, MessageSubscriber } from "../../types/handler.ts";
import { createMessage } from "../../message/create.ts";
import { MessageHandlingError } from "../../errors/errors.ts";
import { createNoopLogger } from "../../logger/noop-logger.ts";
import { pumpReactive, pumpSubscriber } from "../pump.ts";

function subscriptionOf<T>(
  payloads: T[],
  failure?: Error,
): Subscription<Message<T>, void> {
  const pending = payloads.map((payload) => createMessage(payload));
  return {
    *next(): Operation<IteratorResult<Message<T>, void>> {
      const message = pending.shift();
      if (message) {
        return { done: false, value: message };
      }
      if (failure) {
        throw failure;
      }
      return { done: true, value: undefined };
    },
  };
}

interface Recorded<T> {
  subscriber: MessageSubscriber<T>;
  events: string[];
  errors: Error[];
}

function recordingSubscriber<T>(
  onSubscribe: (demand: Demand) => void,
  onNext: (message: Message<T>, demand: Demand) => void = () => {},
): Recorded<T> {
  const events: string[] = [];
  const errors: Error[] = [];
  let current: Demand | undefined;
  const subscriber: MessageSubscriber<T> = {
    onSubscribe(demand) {
      current = demand;
      events.push("subscribe");
      onSubscribe(demand);
    },
    onNext(message) {
      events.push(`next:${String(message.payload)}`);
      if (current) onNext(message, current);
    },
    onError(error) {
      events.push("error");
      errors.push(error);
    },
    onComplete() {
      events.push("complete");
    },
  };
  return { subscriber, events, errors };
}

const log = createNoopLogger();

describe("pumpSubscriber", () => {
  it("should deliver one message per requested unit until completion", function* () {
    const { subscriber, events } = recordingSubscriber<string>(
      (demand) => demand.request(1),
      (_message, demand) => demand.request(1),
    );
    const reported: Error[] = [];

    yield* pumpSubscriber(subscriptionOf(["a", "b"]), subscriber, {
      report: (error) => reported.push(error),
      upstreamErrors: "ignore",
      log,
    });

    expect(events).toEqual(["subscribe", "next:a", "next:b", "complete"]);
    expect(reported).toEqual([]);
  });

  it("should report a failed message and keep going", function* () {
    const { subscriber, events } = recordingSubscriber<number>(
      (demand) => demand.request(Infinity),
      (message) => {
        if (message.payload === 2) throw new Error("bad payload");
      },
    );
    const reported: Error[] = [];

    yield* pumpSubscriber(subscriptionOf([1, 2, 3]), subscriber, {
      report: (error) => reported.push(error),
      upstreamErrors: "ignore",
      log,
    });

    expect(events).toEqual(["subscribe", "next:1", "next:2", "next:3", "complete"]);
    expect(reported).toHaveLength(1);
    const [failure] = reported;
    expect(failure).toBeInstanceOf(MessageHandlingError);
    if (failure instanceof MessageHandlingError) {
      expect(failure.failedMessage?.payload).toBe(2);
      expect(failure.cause).toEqual(new Error("bad payload"));
    }
  });

  it("should stop pulling once the subscriber cancels", function* () {
    const { subscriber, events } = recordingSubscriber<string>(
      (demand) => demand.request(Infinity),
      (_message, demand) => demand.cancel(),
    );

    yield* pumpSubscriber(subscriptionOf(["a", "b", "c"]), subscriber, {
      report: () => {},
      upstreamErrors: "ignore",
      log,
    });

    expect(events).toEqual(["subscribe", "next:a"]);
  });

  it("should fail the subscription on a non-positive request", function* () {
    const { subscriber, events, errors } = recordingSubscriber<string>((demand) =>
      demand.request(0),
    );

    yield* pumpSubscriber(subscriptionOf(["a"]), subscriber, {
      report: () => {},
      upstreamErrors: "ignore",
      log,
    });

    expect(events).toEqual(["subscribe", "error"]);
    expect(errors[0]).toBeInstanceOf(RangeError);
    expect(errors[0]?.message).toBe("Demand must be positive, got 0");
  });

  it("should signal an upstream failure to the subscriber only, by default", function* () {
    const failure = new Error("upstream broke");
    const { subscriber, events, errors } = recordingSubscriber<string>((demand) =>
      demand.request(Infinity),
    );
    const reported: Error[] = [];

    yield* pumpSubscriber(subscriptionOf(["a"], failure), subscriber, {
      report: (error) => reported.push(error),
      upstreamErrors: "ignore",
      log,
    });

    expect(events).toEqual(["subscribe", "next:a", "error"]);
    expect(errors).toEqual([failure]);
    expect(reported).toEqual([]);
  });

  it("should also report an upstream failure under the report policy", function* () {
    const failure = new Error("upstream broke");
    const { subscriber } = recordingSubscriber<string>((demand) => demand.request(Infinity));
    const reported: Error[] = [];

    yield* pumpSubscriber(subscriptionOf([], failure), subscriber, {
      report: (error) => reported.push(error),
      upstreamErrors: "report",
      log,
    });

    expect(reported).toEqual([failure]);
  });

  it("should report a throwing subscriber callback instead of failing", function* () {
    const reported: Error[] = [];
    const subscriber: MessageSubscriber<string> = {
      onSubscribe: (demand) => demand.request(Infinity),
      onNext() {},
      onError() {},
      onComplete() {
        throw new Error("complete failed");
      },
    };

    yield* pumpSubscriber(subscriptionOf(["a"]), subscriber, {
      report: (error) => reported.push(error),
      upstreamErrors: "ignore",
      log,
    });

    expect(reported.map((error) => error.message)).toEqual(["complete failed"]);
  });
});

describe("pumpReactive", () => {
  it("should run completions one at a time under a concurrency of 1", function* () {
    const events: string[] = [];

    yield* pumpReactive(
      subscriptionOf(["a", "b"]),
      {
        *handleMessage(message) {
          events.push(`begin:${message.payload}`);
          yield* sleep(1);
          events.push(`end:${message.payload}`);
        },
      },
      { report: () => {}, concurrency: 1, log },
    );

    expect(events).toEqual(["begin:a", "end:a", "begin:b", "end:b"]);
  });

  it("should report a failed completion and finish the others", function* () {
    const done: number[] = [];
    const reported: Error[] = [];

    yield* pumpReactive(
      subscriptionOf([1, 2, 3]),
      {
        *handleMessage(message) {
          yield* sleep(1);
          if (message.payload === 2) throw new Error("no stock");
          done.push(message.payload);
        },
      },
      { report: (error) => reported.push(error), concurrency: Infinity, log },
    );

    expect(done.sort()).toEqual([1, 3]);
    expect(reported).toHaveLength(1);
    expect(reported[0]?.message).toMatch(/^Failed to handle message .+: no stock$/);
  });

  it("should wait for in-flight completions after an upstream failure", function* () {
    const failure = new Error("upstream broke");
    const done: string[] = [];
    const reported: Error[] = [];

    yield* pumpReactive(
      subscriptionOf(["a"], failure),
      {
        *handleMessage(message) {
          yield* sleep(5);
          done.push(message.payload);
        },
      },
      { report: (error) => reported.push(error), concurrency: Infinity, log },
    );

    expect(done).toEqual(["a"]);
    expect(reported).toEqual([failure]);
  });
});
