import assert from "node:assert/strict";
import { test } from "node:test";
import { backoffDelayMs, retry } from "../src/utils/retry.js";

test("backoffDelayMs doubles per attempt up to the cap", () => {
  const opts = { baseDelayMs: 100, maxDelayMs: 500 };
  assert.deepEqual(
    [0, 1, 2, 3, 4].map((a) => backoffDelayMs(a, opts)),
    [100, 200, 400, 500, 500]
  );
});

test("retry returns the first successful result", async () => {
  const seen: number[] = [];
  const value = await retry(
    async (attempt) => {
      seen.push(attempt);
      if (attempt < 2) throw new Error(`fail ${attempt}`);
      return "ok";
    },
    { retries: 3, baseDelayMs: 1, maxDelayMs: 2 }
  );
  assert.equal(value, "ok");
  assert.deepEqual(seen, [0, 1, 2]);
});

test("retry rethrows the last error once attempts run out", async () => {
  const retries: Array<[number, number]> = [];
  await assert.rejects(
    retry(
      async (attempt) => {
        throw new Error(`fail ${attempt}`);
      },
      {
        retries: 2,
        baseDelayMs: 1,
        maxDelayMs: 10,
        onRetry: ({ retry: n, delayMs }) => retries.push([n, delayMs]),
      }
    ),
    { message: "fail 2" }
  );
  assert.deepEqual(retries, [
    [1, 1],
    [2, 2],
  ]);
});

test("retry stops early when shouldRetry declines", async () => {
  let calls = 0;
  await assert.rejects(
    retry(
      async () => {
        calls += 1;
        throw new Error("fatal");
      },
      { retries: 5, baseDelayMs: 1, maxDelayMs: 1, shouldRetry: () => false }
    ),
    { message: "fatal" }
  );
  assert.equal(calls, 1);
});

test("retry rejects with the abort reason while waiting to retry", async () => {
  const controller = new AbortController();
  let calls = 0;
  const pending = retry(
    async () => {
      calls += 1;
      throw new Error("transient");
    },
    { retries: 3, baseDelayMs: 10_000, maxDelayMs: 10_000, signal: controller.signal }
  );
  setTimeout(() => controller.abort(new Error("stopped")), 10);
  await assert.rejects(pending, { message: "stopped" });
  assert.equal(calls, 1);
});
