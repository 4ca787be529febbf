import { z } from "zod";

export const CompletionConfigSchema = z
  .object({
    ttlMs: z.number().int().positive().optional(),
    maxEntries: z.number().int().positive().optional(),
    limit: z.number().int().positive().optional(),
    partialKeyLength: z.number().int().positive().optional(),
  })
  .strict();

export const HelpConfigSchema = z
  .object({
    pageSize: z.number().int().positive().optional(),
  })
  .strict();

export const CooldownConfigSchema = z
  .object({
    sweepIntervalMs: z.number().int().nonnegative().optional(),
  })
  .strict();

export const CommandsConfigSchema = z
  .object({
    debug: z.boolean().optional(),
    slowDispatchMs: z.number().nonnegative().optional(),
    slowCompletionMs: z.number().nonnegative().optional(),
    completion: CompletionConfigSchema.optional(),
    help: HelpConfigSchema.optional(),
    cooldowns: CooldownConfigSchema.optional(),
    messages: z.record(z.string(), z.string()).optional(),
  })
  .strict();
