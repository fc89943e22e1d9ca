import { z } from "zod";

export const HandlersConfigSchema = z
  .object({
    /** Handler modules, resolved relative to the config file. */
    paths: z.array(z.string().min(1)).optional(),
  })
  .strict();

export type HandlersConfig = z.infer<typeof HandlersConfigSchema>;
