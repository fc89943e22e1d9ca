import { z } from "zod";
import { EngineConfigSchema } from "./engine";
import { HandlersConfigSchema } from "./handlers";
import { LoggingSchema } from "./logging";

export const CmdwireConfigSchema = z
  .object({
    $schema: z.string().optional(),
    logging: LoggingSchema.optional(),
    engine: EngineConfigSchema.optional(),
    handlers: HandlersConfigSchema.optional(),
  })
  .strict();

export type CmdwireConfig = z.infer<typeof CmdwireConfigSchema>;
