import test from "node:test";
import assert from "node:assert/strict";
import { Mutex, TimeoutError, errorMessage, retry, sleep, withTimeout } from "./async.js";

test("withTimeout passes through a fast result", async () => {
  assert.equal(await withTimeout(Promise.resolve(7), 1000, "fast"), 7);
});

test("withTimeout rejects a slow promise", async () => {
  await assert.rejects(
    () => withTimeout(sleep(200), 20, "slow op"),
    (e: unknown) => e instanceof TimeoutError && e.code === "ETIMEDOUT" && e.message === "slow op timed out after 20ms"
  );
});

test("retry stops at the first success", async () => {
  let calls = 0;
  const retried: number[] = [];
  const out = await retry(
    async () => {
      calls++;
      if (calls < 3) throw new Error(`fail ${calls}`);
      return "ok";
    },
    { attempts: 5, delayMs: 0, onRetry: (_err, attempt) => retried.push(attempt) }
  );
  assert.equal(out, "ok");
  assert.equal(calls, 3);
  assert.deepEqual(retried, [1, 2]);
});

test("retry rethrows the last error", async () => {
  let calls = 0;
  await assert.rejects(
    () =>
      retry(
        async () => {
          calls++;
          throw new Error(`fail ${calls}`);
        },
        { attempts: 2, delayMs: 0 }
      ),
    /fail 2/
  );
  assert.equal(calls, 2);
});

test("Mutex runs sections one at a time in call order", async () => {
  const mutex = new Mutex();
  const events: string[] = [];
  const section = (name: string, ms: number) =>
    mutex.runExclusive(async () => {
      events.push(`${name}:start`);
      await sleep(ms);
      events.push(`${name}:end`);
      return name;
    });

  const failing = mutex.runExclusive(async () => {
    throw new Error("boom");
  });
  const results = await Promise.all([section("a", 20), section("b", 0), failing.catch((e: unknown) => errorMessage(e))]);
  assert.deepEqual(results, ["a", "b", "boom"]);
  assert.deepEqual(events, ["a:start", "a:end", "b:start", "b:end"]);
});
