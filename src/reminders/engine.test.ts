import test from "node:test";
import assert from "node:assert/strict";
import { DeliveryFailedError, InvalidRecurrenceError, PersistenceFailedError } from "../errors.js";
import { silentLogger } from "../logger.js";
import { sleep, withTimeout } from "../utils/async.js";
import { AlarmController } from "./alarm.js";
import { SchedulingEngine } from "./engine.js";
import { MemoryReminderStore, type ReminderStore } from "./store.js";
import { FlakyStore, GatedDeliverer, HOUR, MINUTE, ManualClock, RecordingDeliverer, makeRecord, testEngineOptions } from "./testing.js";
import { systemClock, type Clock, type Deliverer, type ReminderRecord } from "./types.js";

const T = Date.UTC(2026, 9, 18, 12, 0);

async function setup(store: ReminderStore, records: ReminderRecord[], now: number) {
  const clock = new ManualClock(now);
  const deliverer = new RecordingDeliverer();
  const engine = await trackAll(store, records, clock, deliverer);
  return { clock, deliverer, engine };
}

async function trackAll(store: ReminderStore, records: ReminderRecord[], clock: Clock, deliverer: Deliverer) {
  const engine = new SchedulingEngine({
    store,
    deliverer,
    alarms: new AlarmController(),
    clock,
    options: testEngineOptions,
    logger: silentLogger
  });
  for (const rec of records) {
    await store.create(rec);
    await engine.exclusive(() => engine.track(rec));
  }
  return engine;
}

test("nothing fires before it is due", async () => {
  const store = new MemoryReminderStore();
  const { engine, deliverer } = await setup(store, [makeRecord({ nextFireAtMs: T })], T - 1);
  assert.deepEqual(await engine.wake(), []);
  assert.equal(deliverer.delivered.length, 0);
  assert.deepEqual(engine.pending(), [{ reminderId: "r-1", kind: "occurrence", atMs: T }]);
});

test("a late wake fires each reminder once and moves it into the future", async () => {
  const store = new MemoryReminderStore();
  const records = [
    makeRecord({ id: "a", recurrence: { kind: "interval", everyMs: MINUTE }, nextFireAtMs: T }),
    makeRecord({ id: "b", recurrence: { kind: "cron", expression: "*/5 * * * *" }, nextFireAtMs: T })
  ];
  const { engine, deliverer } = await setup(store, records, T + 3 * MINUTE + 30_000);

  const outcomes = await engine.wake();
  assert.deepEqual(
    outcomes.map((o) => [o.reminderId, o.status, o.nextFireAtMs]),
    [
      ["a", "delivered", T + 4 * MINUTE],
      ["b", "delivered", T + 5 * MINUTE]
    ]
  );
  assert.deepEqual(deliverer.delivered.map((n) => n.reminderId), ["a", "b"]);
  assert.equal((await store.get("a"))?.nextFireAtMs, T + 4 * MINUTE);
  assert.equal((await store.get("a"))?.lastFiredAtMs, T + 3 * MINUTE + 30_000);
  assert.deepEqual(await engine.wake(), []);
});

test("a one-off reminder is removed after it fires", async () => {
  const store = new MemoryReminderStore();
  const { engine, deliverer } = await setup(store, [makeRecord({ nextFireAtMs: T })], T);

  const [outcome] = await engine.wake();
  assert.equal(outcome.status, "delivered");
  assert.equal(outcome.terminal, true);
  assert.equal(deliverer.delivered[0].text, "drink water");
  assert.equal(await store.get("r-1"), null);
  assert.equal(engine.tracked("r-1"), undefined);
  assert.deepEqual(engine.pending(), []);
});

test("a failed delivery is not retried and the schedule still advances", async () => {
  const store = new MemoryReminderStore();
  const rec = makeRecord({ recurrence: { kind: "interval", everyMs: HOUR }, nextFireAtMs: T });
  const { engine, deliverer } = await setup(store, [rec], T);
  deliverer.failWith = new Error("connection refused");

  const [outcome] = await engine.wake();
  assert.equal(outcome.status, "delivery_failed");
  assert.ok(outcome.error instanceof DeliveryFailedError);
  assert.equal((await store.get("r-1"))?.nextFireAtMs, T + HOUR);
  assert.deepEqual(engine.pending(), [{ reminderId: "r-1", kind: "occurrence", atMs: T + HOUR }]);
});

test("a reminder whose schedule cannot be saved is halted and not delivered", async () => {
  const store = new FlakyStore();
  const rec = makeRecord({ recurrence: { kind: "interval", everyMs: HOUR }, nextFireAtMs: T });
  const { engine, deliverer } = await setup(store, [rec], T);
  store.failWrites = true;

  const [outcome] = await engine.wake();
  assert.equal(outcome.status, "halted");
  assert.ok(outcome.error instanceof PersistenceFailedError);
  assert.equal(outcome.error.attempts, 2);
  assert.equal(store.writeAttempts, 2);
  assert.equal(deliverer.delivered.length, 0);
  assert.deepEqual(engine.halted(), ["r-1"]);
  assert.deepEqual(engine.pending(), []);
  assert.equal((await store.get("r-1"))?.nextFireAtMs, T);
});

test("an occurrence wins over an alarm repeat due in the same wake", async () => {
  const store = new MemoryReminderStore();
  const rec = makeRecord({
    recurrence: { kind: "interval", everyMs: HOUR },
    nextFireAtMs: T,
    isAlarm: true,
    alarmNextAtMs: T
  });
  const { engine, deliverer } = await setup(store, [rec], T);

  const outcomes = await engine.wake();
  assert.deepEqual(outcomes.map((o) => o.kind), ["occurrence"]);
  assert.equal(deliverer.delivered.length, 1);
  assert.deepEqual(engine.pending(), [
    { reminderId: "r-1", kind: "alarm", atMs: T + 5 * MINUTE },
    { reminderId: "r-1", kind: "occurrence", atMs: T + HOUR }
  ]);
});

test("a reminder deleted from the store behind the engine is dropped", async () => {
  const store = new MemoryReminderStore();
  const { engine, deliverer } = await setup(store, [makeRecord({ recurrence: { kind: "interval", everyMs: HOUR }, nextFireAtMs: T })], T);
  await store.delete("r-1");

  assert.deepEqual(await engine.wake(), []);
  assert.equal(deliverer.delivered.length, 0);
  assert.equal(engine.tracked("r-1"), undefined);
});

test("persist retries before giving up", async () => {
  const store = new FlakyStore();
  const { engine } = await setup(store, [], T);
  store.failWrites = true;
  await assert.rejects(
    () => engine.persist("x", () => store.update("x", { nextFireAtMs: 1 })),
    (e: unknown) => e instanceof PersistenceFailedError && e.reminderId === "x" && e.attempts === 2
  );
  assert.equal(store.writeAttempts, 2);
});

test("a reminder whose next occurrence cannot be computed is halted and kept", async () => {
  const store = new MemoryReminderStore();
  const rec = makeRecord({ recurrence: { kind: "interval", everyMs: 0 }, nextFireAtMs: T });
  const { engine, deliverer } = await setup(store, [rec], T);

  const [outcome] = await engine.wake();
  assert.equal(outcome.status, "halted");
  assert.ok(outcome.error instanceof InvalidRecurrenceError);
  assert.equal(deliverer.delivered.length, 0);
  assert.deepEqual(engine.halted(), ["r-1"]);
  assert.deepEqual(engine.pending(), []);
  assert.equal((await store.get("r-1"))?.nextFireAtMs, T);
});

test("a reminder that comes due again while still being delivered waits for that delivery", async () => {
  const store = new MemoryReminderStore();
  const clock = new ManualClock(T);
  const deliverer = new GatedDeliverer();
  const rec = makeRecord({ recurrence: { kind: "interval", everyMs: MINUTE }, nextFireAtMs: T });
  const engine = await trackAll(store, [rec], clock, deliverer);

  const first = engine.wake();
  await deliverer.waitForStarted(1);

  clock.set(T + MINUTE);
  assert.deepEqual(await engine.wake(), []);
  assert.equal(deliverer.started.length, 1);
  assert.deepEqual(engine.pending(), []);

  deliverer.openAll();
  const [firstOutcome] = await first;
  assert.equal(firstOutcome.status, "delivered");
  assert.deepEqual(engine.pending(), [{ reminderId: "r-1", kind: "occurrence", atMs: T + MINUTE }]);

  const second = engine.wake();
  await deliverer.waitForStarted(2);
  deliverer.openAll();
  const [secondOutcome] = await second;
  assert.equal(secondOutcome.scheduledAtMs, T + MINUTE);
  assert.equal(secondOutcome.nextFireAtMs, T + 2 * MINUTE);
  assert.equal(deliverer.maxActive, 1);
});

test("a slow delivery does not delay other reminders on the timer", async () => {
  const store = new MemoryReminderStore();
  const deliverer = new GatedDeliverer((n) => n.reminderId === "slow");
  const now = Date.now();
  const engine = await trackAll(
    store,
    [makeRecord({ id: "slow", nextFireAtMs: now + 20 }), makeRecord({ id: "fast", nextFireAtMs: now + 100 })],
    systemClock,
    deliverer
  );

  engine.start();
  try {
    await withTimeout(deliverer.waitForStarted(2), 1000, "second reminder");
    assert.deepEqual(deliverer.started.map((n) => n.reminderId), ["slow", "fast"]);
    assert.equal(deliverer.active, 1);
  } finally {
    engine.stop();
    deliverer.openAll();
  }
});

test("a stopped engine does not fire", async () => {
  const store = new MemoryReminderStore();
  const deliverer = new RecordingDeliverer();
  const engine = await trackAll(store, [], systemClock, deliverer);
  engine.start();
  engine.stop();
  const rec = makeRecord({ nextFireAtMs: Date.now() + 10 });
  await store.create(rec);
  await engine.exclusive(() => engine.track(rec));

  await sleep(60);
  assert.equal(deliverer.delivered.length, 0);
  assert.deepEqual(engine.pending(), [{ reminderId: "r-1", kind: "occurrence", atMs: rec.nextFireAtMs }]);
});
