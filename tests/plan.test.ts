import assert from "node:assert/strict";
import { test } from "node:test";
import { planChunks } from "../src/pipeline/plan.js";
import { PlanningError } from "../src/pipeline/errors.js";

test("planChunks tiles 150s into three windows with leading overlap", () => {
  const windows = planChunks(150_000, 60_000, 1_500);
  assert.deepEqual(windows, [
    { chunkIndex: 0, logicalStartMs: 0, logicalEndMs: 60_000, actualStartMs: 0, actualEndMs: 60_000 },
    { chunkIndex: 1, logicalStartMs: 60_000, logicalEndMs: 120_000, actualStartMs: 58_500, actualEndMs: 120_000 },
    { chunkIndex: 2, logicalStartMs: 120_000, logicalEndMs: 150_000, actualStartMs: 118_500, actualEndMs: 150_000 },
  ]);
});

test("planChunks returns no windows for empty audio", () => {
  assert.deepEqual(planChunks(0, 60_000, 1_500), []);
});

test("planChunks returns a single window when audio fits in one chunk", () => {
  const windows = planChunks(30_000, 60_000, 1_500);
  assert.equal(windows.length, 1);
  assert.equal(windows[0]?.actualStartMs, 0);
  assert.equal(windows[0]?.logicalEndMs, 30_000);
});

test("planChunks keeps an exact multiple to whole chunks", () => {
  const windows = planChunks(120_000, 60_000, 0);
  assert.equal(windows.length, 2);
  assert.equal(windows[1]?.actualStartMs, 60_000);
});

test("planChunks clamps overlap larger than the previous chunk at zero", () => {
  const windows = planChunks(25_000, 10_000, 15_000);
  assert.deepEqual(
    windows.map((w) => [w.actualStartMs, w.logicalStartMs]),
    [
      [0, 0],
      [0, 10_000],
      [5_000, 20_000],
    ]
  );
});

test("planChunks logical windows partition the audio for many lengths", () => {
  for (const length of [1, 999, 1_000, 1_001, 59_999, 60_000, 60_001, 181_234]) {
    const windows = planChunks(length, 1_000, 250);
    assert.equal(windows[0]?.logicalStartMs, 0);
    assert.equal(windows[windows.length - 1]?.logicalEndMs, length);
    windows.forEach((w, i) => {
      assert.equal(w.chunkIndex, i);
      assert.ok(w.actualStartMs <= w.logicalStartMs);
      assert.ok(w.logicalStartMs < w.logicalEndMs);
      assert.equal(w.actualEndMs, w.logicalEndMs);
      assert.ok(w.logicalStartMs - w.actualStartMs <= 250);
      const next = windows[i + 1];
      if (next) assert.equal(w.logicalEndMs, next.logicalStartMs);
    });
  }
});

test("planChunks rejects invalid policy with PlanningError", () => {
  assert.throws(() => planChunks(10_000, 0, 0), PlanningError);
  assert.throws(() => planChunks(10_000, -5, 0), PlanningError);
  assert.throws(() => planChunks(10_000, 1_000, -1), PlanningError);
  assert.throws(() => planChunks(10_000.5, 1_000, 0), PlanningError);
  assert.throws(() => planChunks(-1, 1_000, 0), PlanningError);
});

test("planChunks windows are frozen", () => {
  const [first] = planChunks(5_000, 1_000, 0);
  assert.ok(first);
  assert.equal(Object.isFrozen(first), true);
});
