import { z } from "zod";
import type { ErrorHandler } from "../errors/handler.ts";

// ============================================================================
// Consumer Endpoint Options
// ============================================================================

/**
 * What a subscriber-mode endpoint does when the producer fails:
 * - `ignore`: forward to `subscriber.onError` only
 * - `report`: also pass the failure to the error handler
 */
export const UpstreamErrorPolicySchema = z.enum(["ignore", "report"]);

export const ConsumerOptionsSchema = z
  .object({
    /** Name used in log lines (default: `<input channel>.consumer`) */
    name: z.string().min(1).optional(),
    /** Error handler; resolved from the starting scope when absent */
    errorHandler: z
      .custom<ErrorHandler>((value) => typeof value === "function", {
        message: "errorHandler must be a function",
      })
      .optional(),
    upstreamErrors: UpstreamErrorPolicySchema.default("ignore"),
    /** Most completions in flight at once in reactive mode */
    concurrency: z
      .union([z.number().int().positive(), z.literal(Infinity)])
      .default(Infinity),
    /** Start the endpoint when the resource is acquired */
    autoStartup: z.boolean().default(true),
  })
  .strict();

export type UpstreamErrorPolicy = z.infer<typeof UpstreamErrorPolicySchema>;

/** Options as accepted from callers */
export type ConsumerOptions = z.input<typeof ConsumerOptionsSchema>;

/** Options after defaults have been applied */
export type ResolvedConsumerOptions = z.output<typeof ConsumerOptionsSchema>;
