import test from "node:test";
import assert from "node:assert/strict";
import { AmbiguousError, InvalidInputError, InvalidRecurrenceError, InvalidScheduleError, NotFoundError } from "../errors.js";
import { matchReminders, sortBySchedule, type CreateReminderInput } from "./service.js";
import { MemoryReminderStore } from "./store.js";
import { HOUR, MINUTE, SECOND, makeHarness, makeRecord } from "./testing.js";

const NOW = Date.UTC(2026, 9, 18, 12, 0);
const ROOM = "group:100";

function input(overrides: Partial<CreateReminderInput> = {}): CreateReminderInput {
  return {
    roomId: ROOM,
    creatorId: "42",
    target: "user",
    text: "take out the trash",
    recurrence: { kind: "once" },
    startAtMs: NOW + 5 * MINUTE,
    ...overrides
  };
}

test("a one-off reminder fires once and leaves the list", async () => {
  const h = makeHarness({ now: NOW });
  const rec = await h.service.create(input());
  assert.equal(rec.nextFireAtMs, NOW + 5 * MINUTE);
  assert.equal((await h.service.list(ROOM)).length, 1);

  h.clock.set(NOW + 5 * MINUTE + SECOND);
  const outcomes = await h.engine.wake();
  assert.equal(outcomes.length, 1);
  assert.equal(h.deliverer.delivered.length, 1);
  assert.equal(h.deliverer.delivered[0].text, "take out the trash");
  assert.deepEqual(await h.service.list(ROOM), []);

  h.clock.advance(HOUR);
  assert.deepEqual(await h.engine.wake(), []);
});

test("a start time in the past is rejected and nothing is stored", async () => {
  const h = makeHarness({ now: NOW });
  await assert.rejects(
    () => h.service.create(input({ startAtMs: NOW - MINUTE })),
    (e: unknown) => e instanceof InvalidScheduleError && e.message === "the first reminder time is in the past (1 minute ago)"
  );
  assert.deepEqual(await h.store.list(), []);
  assert.deepEqual(h.engine.pending(), []);
});

test("create validates text, recurrence and the alarm interval", async () => {
  const h = makeHarness({ now: NOW });
  await assert.rejects(() => h.service.create(input({ text: "   " })), InvalidInputError);
  await assert.rejects(() => h.service.create(input({ recurrence: { kind: "interval", everyMs: 0 } })), InvalidRecurrenceError);
  await assert.rejects(() => h.service.create(input({ recurrence: { kind: "cron", expression: "0 25 * * *" } })), InvalidRecurrenceError);
  await assert.rejects(() => h.service.create(input({ isAlarm: true, alarmRepeatMs: 10 })), /at least 1 second/);
  await assert.rejects(() => h.service.create(input({ timezone: "Nowhere/Land" })), /unknown timezone/);
  assert.deepEqual(await h.store.list(), []);
});

test("an interval reminder without a start fires one interval from now", async () => {
  const h = makeHarness({ now: NOW });
  const rec = await h.service.create(input({ recurrence: { kind: "interval", everyMs: HOUR }, startAtMs: null }));
  assert.equal(rec.nextFireAtMs, NOW + HOUR);

  h.clock.set(NOW + HOUR);
  await h.engine.wake();
  h.clock.set(NOW + 2 * HOUR);
  await h.engine.wake();
  assert.equal(h.deliverer.delivered.length, 2);
  assert.equal((await h.store.get(rec.id))?.nextFireAtMs, NOW + 3 * HOUR);
});

test("a cron expression that never matches is stored without a next fire", async () => {
  const h = makeHarness({ now: NOW });
  const rec = await h.service.create(input({ recurrence: { kind: "cron", expression: "0 0 30 2 *" }, startAtMs: null }));
  assert.equal(rec.nextFireAtMs, null);
  assert.deepEqual(h.engine.pending(), []);
});

test("list returns the room's reminders soonest first", async () => {
  const h = makeHarness({ now: NOW });
  await h.service.create(input({ text: "later", startAtMs: NOW + HOUR }));
  await h.service.create(input({ text: "sooner", startAtMs: NOW + MINUTE }));
  await h.service.create(input({ text: "elsewhere", roomId: "group:200" }));
  assert.deepEqual((await h.service.list(ROOM)).map((r) => r.text), ["sooner", "later"]);
});

test("cancel matches by text case-insensitively and by id prefix", async () => {
  const h = makeHarness({ now: NOW });
  const a = await h.service.create(input({ text: "Water plants" }));
  const b = await h.service.create(input({ text: "feed cat" }));

  assert.equal((await h.service.cancel(ROOM, "water PLANTS")).id, a.id);
  assert.equal((await h.service.cancel(ROOM, b.id.slice(0, 6))).id, b.id);
  assert.deepEqual(await h.service.list(ROOM), []);
  assert.deepEqual(h.engine.pending(), []);
});

test("cancel reports unknown and ambiguous queries without changing anything", async () => {
  const h = makeHarness({ now: NOW });
  await h.service.create(input({ text: "standup", startAtMs: NOW + MINUTE }));
  await h.service.create(input({ text: "standup", startAtMs: NOW + HOUR }));

  await assert.rejects(() => h.service.cancel(ROOM, "lunch"), NotFoundError);
  await assert.rejects(
    () => h.service.cancel(ROOM, "standup"),
    (e: unknown) => e instanceof AmbiguousError && e.candidates.length === 2 && e.candidates[0].nextFireAtMs === NOW + MINUTE
  );
  await assert.rejects(() => h.service.cancel("group:200", "standup"), NotFoundError);
  assert.equal((await h.service.list(ROOM)).length, 2);
});

test("silence explains reminders that are not ringing", async () => {
  const h = makeHarness({ now: NOW });
  await h.service.create(input({ text: "plain" }));
  await h.service.create(input({ text: "alarm", isAlarm: true }));

  assert.equal((await h.service.silence(ROOM, "plain")).status, "not_alarm");
  assert.equal((await h.service.silence(ROOM, "alarm")).status, "not_ringing");
  await assert.rejects(() => h.service.silence(ROOM, ""), NotFoundError);
  await assert.rejects(() => h.service.silence(ROOM, "nothing"), NotFoundError);
});

test("recovery expires missed one-off reminders and advances recurring ones", async () => {
  const store = new MemoryReminderStore();
  await store.create(makeRecord({ id: "once", nextFireAtMs: NOW - HOUR }));
  await store.create(makeRecord({ id: "future", nextFireAtMs: NOW + HOUR }));
  await store.create(makeRecord({ id: "every", recurrence: { kind: "interval", everyMs: HOUR }, nextFireAtMs: NOW - 90 * MINUTE }));
  await store.create(
    makeRecord({
      id: "ringing",
      recurrence: { kind: "interval", everyMs: 2 * HOUR },
      nextFireAtMs: NOW + HOUR,
      isAlarm: true,
      alarmNextAtMs: NOW - 7 * MINUTE
    })
  );

  const h = makeHarness({ now: NOW, store });
  const report = await h.service.recover();
  assert.deepEqual(report.expired, ["once"]);
  assert.deepEqual(report.advanced.sort(), ["every", "ringing"]);
  assert.equal(report.restored, 3);

  assert.equal(await store.get("once"), null);
  assert.equal((await store.get("every"))?.nextFireAtMs, NOW + 30 * MINUTE);
  assert.equal((await store.get("ringing"))?.alarmNextAtMs, NOW + 3 * MINUTE);
  assert.equal(h.deliverer.delivered.length, 0);

  const again = makeHarness({ now: NOW, store });
  const second = await again.service.recover();
  assert.deepEqual(second, { restored: 3, advanced: [], expired: [] });
  assert.deepEqual(again.engine.pending(), h.engine.pending());
});

test("matchReminders prefers an exact id, then text, then a long enough id prefix", () => {
  const list = [makeRecord({ id: "abcd-1", text: "abcd" }), makeRecord({ id: "abcd-2", text: "x" })];
  assert.deepEqual(matchReminders(list, "abcd-2").map((r) => r.id), ["abcd-2"]);
  assert.deepEqual(matchReminders(list, "ABCD").map((r) => r.id), ["abcd-1"]);
  assert.deepEqual(matchReminders(list, "abcd-").map((r) => r.id), ["abcd-1", "abcd-2"]);
  assert.deepEqual(matchReminders(list, "abc"), []);
  assert.deepEqual(matchReminders(list, "  "), []);
});

test("sortBySchedule puts reminders without a next fire last", () => {
  const list = [makeRecord({ id: "b", nextFireAtMs: null }), makeRecord({ id: "a", nextFireAtMs: 5 }), makeRecord({ id: "c", nextFireAtMs: 1 })];
  assert.deepEqual(sortBySchedule(list).map((r) => r.id), ["c", "a", "b"]);
});
