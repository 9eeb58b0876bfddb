import assert from "node:assert/strict";
import { test } from "node:test";
import { dedupSeam, findOverlap } from "../src/transcription/seam.js";

test("findOverlap finds the shared suffix/prefix at a seam", () => {
  const prev = "...and then we went to the store";
  const next = "the store was closed";
  assert.equal(findOverlap(prev, next, 80), 9);
  assert.equal(dedupSeam(prev, next, 80), "was closed");
});

test("findOverlap returns 0 when nothing is shared", () => {
  assert.equal(findOverlap("hello there", "general kenobi"), 0);
  assert.equal(dedupSeam("hello there", "general kenobi"), "general kenobi");
});

test("findOverlap returns 0 for empty inputs", () => {
  assert.equal(findOverlap("", "abc"), 0);
  assert.equal(findOverlap("abc", ""), 0);
});

test("findOverlap returns the whole previous text when the new text starts with it", () => {
  assert.equal(findOverlap("went to", "went to the park"), 7);
  assert.equal(dedupSeam("went to", "went to the park"), "the park");
});

test("findOverlap never looks further back than maxOverlap", () => {
  const prev = "abcdefghij";
  const next = "abcdefghij and more";
  assert.equal(findOverlap(prev, next, 10), 10);
  assert.equal(findOverlap(prev, next, 5), 0);
});

test("findOverlap prefers the longest match", () => {
  // "aa" and "a" both match; the longer one wins.
  assert.equal(findOverlap("baa", "aab"), 2);
});

test("dedupSeam does not repeat the duplicated fragment", () => {
  const prev = "we should meet again next week";
  const next = "next week on Tuesday";
  const joined = `${prev} ${dedupSeam(prev, next)}`;
  assert.equal(joined, "we should meet again next week on Tuesday");
  assert.equal(joined.split("next week").length - 1, 1);
});

test("dedupSeam is a no-op when run again on its own output", () => {
  const prev = "the quick brown fox";
  const once = dedupSeam(prev, "brown fox jumps");
  assert.equal(once, "jumps");
  assert.equal(dedupSeam(prev, once), "jumps");
});
