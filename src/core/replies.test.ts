import test from "node:test";
import assert from "node:assert/strict";
import { AmbiguousError, InvalidRecurrenceError, NotFoundError, PersistenceFailedError } from "../errors.js";
import { makeRecord } from "../reminders/testing.js";
import { formatCreated, formatFailure, formatList, formatReminderLine, formatSilence, helpText } from "./replies.js";

const AT = Date.UTC(2026, 9, 20, 9, 0);

test("formatCreated describes cron reminders by their first time", () => {
  const rec = makeRecord({ recurrence: { kind: "cron", expression: "0 9 * * *" }, nextFireAtMs: AT });
  assert.equal(formatCreated(rec), "Ok, I will remind you! The first one is on Oct 20 2026, 09:00.");
});

test("formatCreated shows the time in the reminder's timezone", () => {
  const rec = makeRecord({ nextFireAtMs: AT, timezone: "Asia/Shanghai", target: "room" });
  assert.equal(formatCreated(rec), "Ok, I will remind everyone in the room on Oct 20 2026, 17:00!");
});

test("formatReminderLine marks recurrence, alarms and the short id", () => {
  const rec = makeRecord({
    id: "0123456789abcdef",
    recurrence: { kind: "interval", everyMs: 3_600_000 },
    nextFireAtMs: AT,
    isAlarm: true
  });
  assert.equal(formatReminderLine(rec), "Oct 20 2026, 09:00: drink water (every 1 hour) (has alarm) [01234567]");
  assert.equal(
    formatReminderLine({ ...rec, alarmNextAtMs: AT + 1 }),
    "Oct 20 2026, 09:00: drink water (every 1 hour) (alarm ringing) [01234567]"
  );
  assert.equal(
    formatReminderLine(makeRecord({ id: "abcdefgh-1", recurrence: { kind: "cron", expression: "0 9 * * 1" } })),
    "`0 9 * * 1`: drink water [abcdefgh]"
  );
});

test("formatList joins lines with blank lines", () => {
  const a = makeRecord({ id: "aaaaaaaa-1", nextFireAtMs: AT, text: "one" });
  const b = makeRecord({ id: "bbbbbbbb-1", nextFireAtMs: AT + 60_000, text: "two" });
  assert.equal(formatList([a, b]), "Reminders for this room:\n\nOct 20 2026, 09:00: one [aaaaaaaa]\n\nOct 20 2026, 09:01: two [bbbbbbbb]");
  assert.equal(formatList([]), "There are no reminders for this room.");
});

test("formatSilence explains each outcome", () => {
  const rec = makeRecord({ text: "stretch" });
  assert.equal(formatSilence({ status: "silenced", reminder: rec }), "Alarm silenced.");
  assert.equal(formatSilence({ status: "not_ringing", reminder: rec }), "The reminder 'stretch' does not currently have an alarm going off.");
  assert.equal(formatSilence({ status: "not_alarm", reminder: rec }), "The reminder 'stretch' does not have an alarm.");
});

test("formatFailure covers every reminder error", () => {
  assert.equal(formatFailure(new NotFoundError("lunch"), "cancel"), "Unknown reminder 'lunch'.");
  assert.equal(formatFailure(new NotFoundError("lunch"), "silence"), "Unknown alarm or reminder 'lunch'.");
  assert.equal(formatFailure(new InvalidRecurrenceError("cron expression needs 5 fields"), "create"), "Cron expression needs 5 fields.");
  assert.equal(formatFailure(new PersistenceFailedError("r-1", 3, new Error("disk full")), "create"), "Sorry, I could not save that change. Please try again.");
  assert.equal(formatFailure(new Error("boom"), "list"), "Sorry, something went wrong: boom");

  const candidates = [makeRecord({ id: "aaaaaaaa-1", nextFireAtMs: AT }), makeRecord({ id: "bbbbbbbb-1", nextFireAtMs: AT })];
  assert.equal(
    formatFailure(new AmbiguousError("drink water", candidates), "cancel"),
    "2 reminders match 'drink water':\n" +
      "- Oct 20 2026, 09:00: drink water [aaaaaaaa]\n" +
      "- Oct 20 2026, 09:00: drink water [bbbbbbbb]\n" +
      "Use the id in brackets to pick one."
  );
});

test("helpText lists the commands with the configured prefix", () => {
  const text = helpText("/", "commands");
  assert.ok(text.includes("/remindme [every <recurring time>;] <start time>; <reminder text>"));
  assert.ok(text.includes("/silence [<reminder text>]"));
  assert.equal(helpText("/", "other"), "Unknown help topic!");
});
