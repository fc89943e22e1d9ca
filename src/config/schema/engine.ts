import { z } from "zod";

/**
 * Typo suggestions attached to `UnknownCommand` reports.
 */
export const SuggestionsSchema = z
  .object({
    enabled: z.boolean().optional(),
    /** Largest edit distance still offered as "did you mean". Defaults to 3. */
    maxDistance: z.number().int().min(0).max(16).optional(),
  })
  .strict();

export const EngineConfigSchema = z
  .object({
    suggestions: SuggestionsSchema.optional(),
    /** Timeout for handlers that return a promise. Unset means no timeout. */
    handlerTimeoutMs: z.number().int().min(1).max(600_000).optional(),
    /**
     * String and record commands dispatched without `parameters`: "null" hands the
     * handler `null`, "reject" reports a conversion failure.
     */
    absentParameters: z.enum(["null", "reject"]).optional(),
    logPayloads: z.boolean().optional(),
  })
  .strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
