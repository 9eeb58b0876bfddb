import test from "node:test";
import assert from "node:assert/strict";
import { formatJsonl } from "../src/formatters/jsonl.js";

test("formatJsonl emits one JSON object per segment and gap", () => {
  const jsonl = formatJsonl(
    {
      wordTokens: [],
      segments: [
        { start: 0, end: 1.5, text: "Hello world", speaker: "Speaker 1" },
        { start: 125, end: 130.2, text: "Second line" },
      ],
      text: "Hello world Second line",
    },
    [{ chunkIndex: 1, logicalStartMs: 60_000, logicalEndMs: 120_000, error: "boom" }]
  );

  const lines = jsonl.split("\n").map((line) => JSON.parse(line));
  assert.deepEqual(lines, [
    { type: "segment", index: 1, startSeconds: 0, endSeconds: 1.5, speaker: "Speaker 1", text: "Hello world" },
    { type: "segment", index: 2, startSeconds: 125, endSeconds: 130.2, text: "Second line" },
    { type: "gap", chunkIndex: 1, startSeconds: 60, endSeconds: 120, error: "boom" },
  ]);
});

test("formatJsonl emits a single text line without segments", () => {
  const jsonl = formatJsonl({ wordTokens: [], segments: [], text: "plain" });
  assert.equal(jsonl, '{"type":"text","index":1,"text":"plain"}');
});
