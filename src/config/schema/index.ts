import { z } from "zod";
import { CommandsConfigSchema } from "./commands";
import { LoggingSchema } from "./logging";

export const CmdtreeConfigSchema = z
  .object({
    $schema: z.string().optional(),
    logging: LoggingSchema.optional(),
    commands: CommandsConfigSchema.optional(),
  })
  .strict();

export type CmdtreeConfig = z.infer<typeof CmdtreeConfigSchema>;
export type CommandsConfig = z.infer<typeof CommandsConfigSchema>;
