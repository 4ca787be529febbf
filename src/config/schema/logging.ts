import { z } from "zod";
import { LOG_LEVELS } from "../../logger";

export const LoggingSchema = z
  .object({
    level: z.enum(LOG_LEVELS).optional(),
  })
  .strict();
