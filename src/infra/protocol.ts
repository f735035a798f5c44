import { z } from "zod";
import type { TranscriptEntry } from "../utils/transcription";

/**
 * Messages exchanged with parse worker threads. Both ends validate what they
 * receive, since `postMessage` payloads arrive untyped.
 */

const entrySchema: z.ZodType<TranscriptEntry> = z.lazy(() =>
  z.union([
    z.string(),
    z.object({
      kind: z.literal("alternate"),
      branches: z.array(z.array(entrySchema)),
    }),
  ]),
);

const recordSchema = z.object({
  uttId: z.string(),
  transcript: z.array(entrySchema),
});

const warningSchema = z.object({
  uttId: z.string(),
  lineNumber: z.number().int().optional(),
  message: z.string(),
});

export const workerDataSchema = z.object({
  warn: z.boolean(),
});

export const workerRequestSchema = z.object({
  id: z.number().int(),
  chunk: z.object({
    startLine: z.number().int().min(1),
    lines: z.array(z.string()),
  }),
});

export const workerResponseSchema = z.union([
  z.object({
    id: z.number().int(),
    fatal: z.string(),
  }),
  z.object({
    id: z.number().int(),
    records: z.array(recordSchema),
    warnings: z.array(warningSchema),
    error: z
      .object({
        code: z.enum(["FORMAT_ERROR", "EMPTY_ALTERNATE"]),
        line: z.string(),
        lineNumber: z.number().int().optional(),
      })
      .optional(),
  }),
]);

export type WorkerData = z.infer<typeof workerDataSchema>;
export type WorkerRequest = z.infer<typeof workerRequestSchema>;
export type WorkerResponse = z.infer<typeof workerResponseSchema>;
