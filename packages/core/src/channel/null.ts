import type { NullChannel } from "../types/channel.ts";

/**
 * The end of a flow. Every send succeeds and the message is dropped.
 */
export function createNullChannel(): NullChannel {
  return {
    kind: "null",
    name: "nullChannel",
    send: () => true,
  };
}
