import { z } from "zod";

export const configSchema = z.object({
  openaiApiKey: z.string().min(1).optional(),
  /** Unset means whisper-1, or gpt-4o-transcribe-diarize when diarizing. */
  openaiModel: z.string().min(1).optional(),
  openaiBaseUrl: z.string().url().default("https://api.openai.com/v1"),
  language: z.string().optional(),
  diarize: z.boolean().default(false),
  outputDir: z.string().default("output"),
  chunkDurationMs: z.number().int().positive().default(60_000),
  overlapMs: z.number().int().nonnegative().default(1_500),
  maxOverlapChars: z.number().int().nonnegative().default(80),
  epsilonSec: z.number().nonnegative().default(0.01),
  concurrency: z.number().int().positive().default(2),
  chunkRetries: z.number().int().nonnegative().default(2),
  retryBaseDelayMs: z.number().int().nonnegative().default(1_000),
  retryMaxDelayMs: z.number().int().nonnegative().default(15_000),
  // Per attempt; retries each get a fresh timer.
  chunkTimeoutMs: z.number().int().positive().default(120_000),
  ffmpegPath: z.string().optional(),
  ffprobePath: z.string().optional(),
});

export type AppConfig = z.infer<typeof configSchema>;
