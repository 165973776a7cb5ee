import { DateTime } from "luxon";
import { parseDuration } from "../reminders/duration.js";

type Clock = { hour: number; minute: number };

const WEEKDAYS: Record<string, number> = {
  mon: 1,
  monday: 1,
  tue: 2,
  tues: 2,
  tuesday: 2,
  wed: 3,
  wednesday: 3,
  thu: 4,
  thur: 4,
  thurs: 4,
  thursday: 4,
  fri: 5,
  friday: 5,
  sat: 6,
  saturday: 6,
  sun: 7,
  sunday: 7
};

/** "9", "9:30", "9pm", "9:30 am", "21:00", "noon", "midnight". */
export function parseClock(input: string): Clock | null {
  const s = input.trim().toLowerCase();
  if (s === "noon") return { hour: 12, minute: 0 };
  if (s === "midnight") return { hour: 0, minute: 0 };

  const m = s.match(/^(\d{1,2})(?:[:.](\d{2}))?\s*(am|pm|a\.m\.|p\.m\.)?$/);
  if (!m) return null;
  let hour = Number(m[1]);
  const minute = m[2] ? Number(m[2]) : 0;
  const meridiem = m[3]?.replace(/\./g, "");
  if (minute > 59) return null;
  if (meridiem) {
    if (hour < 1 || hour > 12) return null;
    if (meridiem === "am" && hour === 12) hour = 0;
    if (meridiem === "pm" && hour !== 12) hour += 12;
  } else if (hour > 23) {
    return null;
  }
  return { hour, minute };
}

function at(day: DateTime, clock: Clock): DateTime {
  return day.set({ hour: clock.hour, minute: clock.minute, second: 0, millisecond: 0 });
}

function parseIsoLike(s: string, zone: string): number | null {
  if (!/^\d{4}-\d{2}-\d{2}/.test(s)) return null;
  const dt = DateTime.fromISO(s.replace(/\s+/, "T"), { zone });
  return dt.isValid ? dt.toMillis() : null;
}

/**
 * Turns a human start time into an instant, evaluated in `timezone`.
 * A bare clock time that has already passed today means tomorrow; an
 * explicit "today" keeps the day and may return a past instant.
 * Returns null when the text is not a start time.
 */
export function parseStartTime(text: string, nowMs: number, timezone: string): number | null {
  const s = String(text ?? "")
    .trim()
    .toLowerCase()
    .replace(/\s+/g, " ");
  if (!s) return null;
  if (s === "now") return nowMs;

  const now = DateTime.fromMillis(nowMs, { zone: timezone });

  const iso = parseIsoLike(s, timezone);
  if (iso !== null) return iso;

  const relative = s.startsWith("in ") ? s.slice(3) : s;
  const duration = parseDuration(relative);
  if (duration !== null) return nowMs + duration;

  const dayMatch = s.match(/^([a-z]+)(?:\s+(?:at\s+)?(.+))?$/);
  if (dayMatch && (dayMatch[1] === "today" || dayMatch[1] === "tomorrow" || Object.hasOwn(WEEKDAYS, dayMatch[1]))) {
    const clock = dayMatch[2] ? parseClock(dayMatch[2]) : { hour: now.hour, minute: now.minute };
    if (!clock) return null;
    const word = dayMatch[1];
    if (word === "today") return at(now, clock).toMillis();
    if (word === "tomorrow") return at(now.plus({ days: 1 }), clock).toMillis();

    const ahead = (WEEKDAYS[word] - now.weekday + 7) % 7;
    let candidate = at(now.plus({ days: ahead }), clock);
    if (candidate.toMillis() <= nowMs) candidate = at(now.plus({ days: ahead + 7 }), clock);
    return candidate.toMillis();
  }

  const clockText = s.startsWith("at ") ? s.slice(3) : s;
  const clock = parseClock(clockText);
  if (!clock) return null;
  const today = at(now, clock);
  return today.toMillis() > nowMs ? today.toMillis() : at(now.plus({ days: 1 }), clock).toMillis();
}
