import assert from "node:assert/strict";
import { test } from "node:test";
import { trimSegments, trimWords } from "../src/transcription/boundary.js";
import type { Segment, WordToken } from "../src/transcription/types.js";

const words: WordToken[] = [
  { text: "store", start: 59.2, end: 59.6 },
  { text: "was", start: 59.995, end: 60.2 },
  { text: "closed", start: 60.3, end: 60.8, speaker: "A" },
];

test("trimWords keeps tokens at or after the boundary within epsilon", () => {
  const kept = trimWords(words, 60);
  assert.deepEqual(
    kept.map((w) => w.text),
    ["was", "closed"]
  );
});

test("trimWords with zero epsilon drops a token landing just early", () => {
  const kept = trimWords(words, 60, 0);
  assert.deepEqual(
    kept.map((w) => w.text),
    ["closed"]
  );
});

test("trimWords at boundary zero is a no-op", () => {
  assert.deepEqual(trimWords(words, 0), words);
});

test("trimWords preserves order and speaker labels", () => {
  const kept = trimWords(words, 60.3);
  assert.deepEqual(kept, [{ text: "closed", start: 60.3, end: 60.8, speaker: "A" }]);
});

test("trimSegments applies the same rule to segment starts and keeps extra fields", () => {
  const segments: Segment[] = [
    { start: 58.5, end: 60.4, text: "the store was", id: 0 },
    { start: 60.4, end: 62, text: "closed today", id: 1 },
  ];
  assert.deepEqual(trimSegments(segments, 60), [
    { start: 60.4, end: 62, text: "closed today", id: 1 },
  ]);
});

test("every surviving unit starts no earlier than boundary minus epsilon", () => {
  const many: WordToken[] = Array.from({ length: 40 }, (_, i) => ({
    text: `w${i}`,
    start: 118 + i * 0.1,
    end: 118.05 + i * 0.1,
  }));
  const boundary = 120;
  const epsilon = 0.01;
  const kept = trimWords(many, boundary, epsilon);
  assert.ok(kept.length > 0);
  for (const w of kept) assert.ok(w.start >= boundary - epsilon);
  assert.equal(many.length - kept.length, many.filter((w) => w.start < boundary - epsilon).length);
});
