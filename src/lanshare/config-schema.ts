import { z } from "zod";

export const LanshareConfigSchema = z
  .object({
    port: z.number().int().nonnegative().max(65_535).optional(),
    network: z
      .object({
        bindAddress: z.string().min(1).optional(),
        trustedAddresses: z.array(z.string().min(1)).optional(),
        trustLocalInterfaces: z.boolean().optional(),
      })
      .strict()
      .optional(),
    storage: z
      .object({
        saveDir: z.string().optional(),
        maxUploadBytes: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    auth: z
      .object({
        accessCode: z.string().optional(),
        maxFailedAttemptsPerMinute: z.number().int().nonnegative().optional(),
      })
      .strict()
      .optional(),
    sessions: z
      .object({
        maxNameChars: z.number().int().positive().optional(),
        maxNoteChars: z.number().int().positive().optional(),
        maxMessageBytes: z.number().int().positive().optional(),
        maxBufferedBytes: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();
