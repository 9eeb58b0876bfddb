import { z } from "zod";
import { inferWordTokensFromSegments } from "../segmentation.js";
import type { ChunkTranscription, Segment, WordToken } from "../types.js";

const speakerSchema = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined ? undefined : String(v)));

const wordSchema = z.object({
  word: z.string(),
  start: z.number(),
  end: z.number(),
  speaker: speakerSchema,
});

const segmentSchema = z
  .object({
    start: z.number().default(0),
    end: z.number().default(0),
    text: z.string().default(""),
    speaker: speakerSchema,
  })
  .passthrough();

const responseSchema = z
  .object({
    text: z.string().default(""),
    words: z.array(wordSchema).optional(),
    segments: z.array(segmentSchema).optional(),
  })
  .passthrough();

export type OpenAiTranscriptionResponse = z.infer<typeof responseSchema>;

function toSegment(seg: z.infer<typeof segmentSchema>): Segment {
  const { speaker, ...rest } = seg;
  const segment: Segment = { ...rest, start: seg.start, end: seg.end, text: seg.text.trim() };
  if (speaker !== undefined) segment.speaker = speaker;
  return segment;
}

function toWordToken(word: z.infer<typeof wordSchema>): WordToken {
  const token: WordToken = { text: word.word.trim(), start: word.start, end: word.end };
  if (word.speaker !== undefined) token.speaker = word.speaker;
  return token;
}

/**
 * Normalizes a transcription payload into chunk-local word tokens, segments
 * and raw text. Word timing is inferred from segments when the payload has
 * none of its own.
 */
export function parseTranscriptionResponse(payload: unknown): ChunkTranscription {
  if (typeof payload === "string") {
    return { wordTokens: [], segments: [], rawText: payload.trim() };
  }

  const data = responseSchema.parse(payload);
  const segments = (data.segments ?? []).map(toSegment);
  const wordTokens =
    data.words && data.words.length > 0
      ? data.words.map(toWordToken).filter((w) => w.text.length > 0)
      : inferWordTokensFromSegments(segments);

  const rawText =
    data.text.trim() ||
    segments
      .map((s) => s.text)
      .join(" ")
      .trim();

  return { wordTokens, segments, rawText };
}
