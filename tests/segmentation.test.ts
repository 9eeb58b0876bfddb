import assert from "node:assert/strict";
import { test } from "node:test";
import {
  applyDiarization,
  formatDiarizedTranscript,
  inferWordTokensFromSegments,
  normalizeSpeakerLabels,
  resegmentWords,
} from "../src/transcription/segmentation.js";
import type { WordToken } from "../src/transcription/types.js";

test("inferWordTokensFromSegments spreads duration by character share", () => {
  const words = inferWordTokensFromSegments([
    { start: 0, end: 1, text: "ab cd", speaker: "A" },
  ]);
  assert.deepEqual(words, [
    { text: "ab", start: 0, end: 0.5, speaker: "A" },
    { text: "cd", start: 0.5, end: 1, speaker: "A" },
  ]);
});

test("inferWordTokensFromSegments applies the minimum word duration", () => {
  const words = inferWordTokensFromSegments([{ start: 0, end: 0.05, text: "a bbbbbbbbb" }]);
  assert.deepEqual(words, [
    { text: "a", start: 0, end: 0.04 },
    { text: "bbbbbbbbb", start: 0.04, end: 0.05 },
  ]);
});

test("inferWordTokensFromSegments skips empty segments", () => {
  assert.deepEqual(inferWordTokensFromSegments([{ start: 0, end: 1, text: "   " }]), []);
});

test("resegmentWords splits on punctuation, speaker change and pauses", () => {
  const words: WordToken[] = [
    { text: "Hello.", start: 0, end: 0.4, speaker: "A" },
    { text: "How", start: 0.5, end: 0.7, speaker: "A" },
    { text: "are", start: 0.75, end: 0.9, speaker: "A" },
    { text: "you", start: 0.95, end: 1.1, speaker: "B" },
    { text: "fine", start: 1.5, end: 1.8, speaker: "B" },
  ];
  assert.deepEqual(resegmentWords(words), [
    { start: 0, end: 0.4, text: "Hello.", speaker: "A" },
    { start: 0.5, end: 0.9, text: "How are", speaker: "A" },
    { start: 0.95, end: 1.1, text: "you", speaker: "B" },
    { start: 1.5, end: 1.8, text: "fine", speaker: "B" },
  ]);
});

test("resegmentWords caps segment duration", () => {
  const words: WordToken[] = [
    { text: "a", start: 0, end: 0.3 },
    { text: "b", start: 0.3, end: 0.6 },
    { text: "c", start: 0.6, end: 0.9 },
    { text: "d", start: 0.9, end: 1.2 },
    { text: "e", start: 1.2, end: 1.5 },
    { text: "f", start: 1.5, end: 1.8 },
  ];
  assert.deepEqual(
    resegmentWords(words).map((s) => s.text),
    ["a b c d", "e f"]
  );
});

test("normalizeSpeakerLabels numbers speakers by first appearance", () => {
  const segments = normalizeSpeakerLabels([
    { start: 0, end: 1, text: "x", speaker: "B" },
    { start: 1, end: 2, text: "y", speaker: "A" },
    { start: 2, end: 3, text: "z", speaker: "B" },
    { start: 3, end: 4, text: "w" },
  ]);
  assert.deepEqual(
    segments.map((s) => s.speaker),
    ["Speaker 1", "Speaker 2", "Speaker 1", undefined]
  );
});

test("formatDiarizedTranscript merges consecutive segments of one speaker", () => {
  const text = formatDiarizedTranscript([
    { start: 0, end: 1, text: "Hi.", speaker: "Speaker 1" },
    { start: 1, end: 2, text: "How are you?", speaker: "Speaker 1" },
    { start: 2, end: 3, text: "Fine.", speaker: "Speaker 2" },
    { start: 3, end: 4, text: "  " , speaker: "Speaker 2" },
    { start: 4, end: 5, text: "Okay." },
  ]);
  assert.equal(text, "Speaker 1: Hi. How are you?\nSpeaker 2: Fine.\nUnknown: Okay.");
});

test("applyDiarization rebuilds segments from words and renders speakers", () => {
  const diarized = applyDiarization({
    wordTokens: [
      { text: "Hi.", start: 0, end: 0.3, speaker: "spk_1" },
      { text: "Hello", start: 0.4, end: 0.7, speaker: "spk_0" },
      { text: "there.", start: 0.75, end: 1.0, speaker: "spk_0" },
    ],
    segments: [],
    text: "Hi. Hello there.",
  });
  assert.deepEqual(diarized.segments, [
    { start: 0, end: 0.3, text: "Hi.", speaker: "Speaker 1" },
    { start: 0.4, end: 1.0, text: "Hello there.", speaker: "Speaker 2" },
  ]);
  assert.equal(diarized.text, "Speaker 1: Hi.\nSpeaker 2: Hello there.");
});

test("applyDiarization falls back to segments when there are no words", () => {
  const diarized = applyDiarization({
    wordTokens: [],
    segments: [{ start: 0, end: 2, text: "Only segments.", speaker: "A" }],
    text: "Only segments.",
  });
  assert.equal(diarized.text, "Speaker 1: Only segments.");
});
