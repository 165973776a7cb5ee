import { DateTime } from "luxon";
import { AmbiguousError, isReminderError, NotFoundError } from "../errors.js";
import { formatDuration } from "../reminders/duration.js";
import type { SilenceResult } from "../reminders/service.js";
import type { ReminderRecord } from "../reminders/types.js";
import { errorMessage } from "../utils/async.js";

export function formatWhen(ms: number, timezone: string): string {
  return DateTime.fromMillis(ms, { zone: timezone }).setLocale("en-US").toFormat("LLL dd yyyy, HH:mm");
}

export function shortId(id: string): string {
  return id.slice(0, 8);
}

function isRinging(rec: ReminderRecord): boolean {
  return rec.isAlarm && !rec.silenced && rec.alarmNextAtMs !== null;
}

function sentence(message: string): string {
  const s = message.trim();
  if (!s) return s;
  const head = s[0].toUpperCase() + s.slice(1);
  return /[.!?]$/.test(head) ? head : `${head}.`;
}

export function formatCreated(rec: ReminderRecord): string {
  const who = rec.target === "user" ? "you" : "everyone in the room";
  if (rec.recurrence.kind === "cron") {
    if (rec.nextFireAtMs === null) return `Ok, I will remind ${who}! (\`${rec.recurrence.expression}\` has no upcoming time yet)`;
    return `Ok, I will remind ${who}! The first one is on ${formatWhen(rec.nextFireAtMs, rec.timezone)}.`;
  }
  let text = `Ok, I will remind ${who} on ${formatWhen(rec.nextFireAtMs ?? rec.startAtMs, rec.timezone)}`;
  if (rec.recurrence.kind === "interval") text += `, and again every ${formatDuration(rec.recurrence.everyMs)}`;
  return `${text}!`;
}

export function formatReminderLine(rec: ReminderRecord): string {
  let line =
    rec.recurrence.kind === "cron"
      ? `\`${rec.recurrence.expression}\`: ${rec.text}`
      : `${formatWhen(rec.nextFireAtMs ?? rec.startAtMs, rec.timezone)}: ${rec.text}`;
  if (rec.recurrence.kind === "interval") line += ` (every ${formatDuration(rec.recurrence.everyMs)})`;
  if (rec.isAlarm) line += isRinging(rec) ? " (alarm ringing)" : " (has alarm)";
  return `${line} [${shortId(rec.id)}]`;
}

export function formatList(list: ReminderRecord[]): string {
  if (!list.length) return "There are no reminders for this room.";
  return `Reminders for this room:\n\n${list.map(formatReminderLine).join("\n\n")}`;
}

export function formatCancelled(): string {
  return "Reminder cancelled.";
}

export function formatSilence(result: SilenceResult): string {
  switch (result.status) {
    case "silenced":
      return "Alarm silenced.";
    case "not_ringing":
      return `The reminder '${result.reminder.text}' does not currently have an alarm going off.`;
    case "not_alarm":
      return `The reminder '${result.reminder.text}' does not have an alarm.`;
  }
}

/** Turns a failed reminder operation into the reply shown to the user. */
export function formatFailure(err: unknown, action: "create" | "cancel" | "silence" | "list"): string {
  if (err instanceof NotFoundError) {
    if (action === "silence") return err.query.trim() ? `Unknown alarm or reminder '${err.query}'.` : "There is no alarm going off in this room.";
    return `Unknown reminder '${err.query}'.`;
  }
  if (err instanceof AmbiguousError) {
    const lines = err.candidates.map((r) => `- ${formatReminderLine(r)}`);
    return `${err.candidates.length} reminders match '${err.query}':\n${lines.join("\n")}\nUse the id in brackets to pick one.`;
  }
  if (isReminderError(err)) {
    switch (err.code) {
      case "INVALID_INPUT":
      case "INVALID_RECURRENCE":
      case "INVALID_SCHEDULE":
        return sentence(err.message);
      case "PERSISTENCE_FAILED":
        return "Sorry, I could not save that change. Please try again.";
      default:
        break;
    }
  }
  return `Sorry, something went wrong: ${errorMessage(err)}`;
}

export function helpText(prefix: string, topic?: string): string {
  if (!topic) return `Hello, I am a reminder bot! Use \`${prefix}help commands\` to view available commands.`;
  if (topic !== "commands") return "Unknown help topic!";
  const p = prefix;
  return [
    "Reminders",
    "",
    "Create an optionally recurring reminder that notifies you:",
    `${p}remindme [every <recurring time>;] <start time>; <reminder text>`,
    "",
    "Create an optionally recurring reminder that notifies the whole room:",
    `${p}remindroom [every <recurring time>;] <start time>; <reminder text>`,
    "",
    "List all active reminders for this room:",
    `${p}listreminders`,
    "",
    "Cancel a reminder by its text or the id shown in the list:",
    `${p}cancelreminder <reminder text>`,
    "",
    "Alarms",
    "",
    "An alarm keeps going off after its usual time until it is silenced.",
    "Otherwise the syntax is the same as a reminder:",
    `${p}alarmme [every <recurring time>;] <start time>; <reminder text>`,
    `${p}alarmroom [every <recurring time>;] <start time>; <reminder text>`,
    "",
    "Silence an alarm that is going off:",
    `${p}silence [<reminder text>]`,
    "",
    "Cron syntax",
    "",
    `${p}remindme cron <min> <hour> <day of month> <month> <day of week>; <reminder text>`,
    "This works with any remind or alarm command above.",
    "",
    "Start times: now, in 5 minutes, 9:30, 9pm, noon, tomorrow at 9am, monday 18:00, 2026-10-20 09:00"
  ].join("\n");
}
