import { DateTime } from "luxon";
import { InvalidRecurrenceError } from "../errors.js";

export type CronSchedule = {
  expression: string;
  minute: ReadonlySet<number>;
  hour: ReadonlySet<number>;
  dayOfMonth: ReadonlySet<number>;
  month: ReadonlySet<number>;
  // 0 = Sunday
  dayOfWeek: ReadonlySet<number>;
};

/** Wall-clock components of an instant in some timezone. */
export type LocalTime = {
  minute: number;
  hour: number;
  day: number;
  month: number;
  weekday: number;
};

type FieldSpec = {
  name: string;
  min: number;
  max: number;
  names?: Record<string, number>;
};

const MONTH_NAMES: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12
};

const DAY_NAMES: Record<string, number> = { sun: 0, mon: 1, tue: 2, wed: 3, thu: 4, fri: 5, sat: 6 };

const FIELDS: FieldSpec[] = [
  { name: "minute", min: 0, max: 59 },
  { name: "hour", min: 0, max: 23 },
  { name: "day of month", min: 1, max: 31 },
  { name: "month", min: 1, max: 12, names: MONTH_NAMES },
  { name: "day of week", min: 0, max: 7, names: DAY_NAMES }
];

// Covers every weekday/leap-day combination.
const SEARCH_HORIZON_YEARS = 28;

function parseValue(raw: string, field: FieldSpec): number {
  const key = raw.toLowerCase();
  if (field.names && Object.hasOwn(field.names, key)) return field.names[key];
  if (!/^\d+$/.test(raw)) throw new InvalidRecurrenceError(`invalid ${field.name} value '${raw}'`);
  const n = Number(raw);
  if (n < field.min || n > field.max) {
    throw new InvalidRecurrenceError(`${field.name} value ${n} is outside ${field.min}-${field.max}`);
  }
  return n;
}

function parseField(raw: string, field: FieldSpec): Set<number> {
  const out = new Set<number>();
  for (const item of raw.split(",")) {
    if (!item) throw new InvalidRecurrenceError(`empty item in ${field.name} field '${raw}'`);
    const [rangePart, stepPart, extra] = item.split("/");
    if (extra !== undefined) throw new InvalidRecurrenceError(`invalid step in '${item}'`);

    let step = 1;
    if (stepPart !== undefined) {
      if (!/^\d+$/.test(stepPart) || Number(stepPart) < 1) throw new InvalidRecurrenceError(`invalid step in '${item}'`);
      step = Number(stepPart);
    }

    let lo: number;
    let hi: number;
    if (rangePart === "*") {
      lo = field.min;
      hi = field.max;
    } else if (rangePart.includes("-")) {
      const [a, b, more] = rangePart.split("-");
      if (more !== undefined || !a || !b) throw new InvalidRecurrenceError(`invalid range '${rangePart}'`);
      lo = parseValue(a, field);
      hi = parseValue(b, field);
      if (lo > hi) throw new InvalidRecurrenceError(`range '${rangePart}' runs backwards`);
    } else {
      lo = parseValue(rangePart, field);
      hi = stepPart !== undefined ? field.max : lo;
    }

    for (let v = lo; v <= hi; v += step) out.add(v);
  }
  return out;
}

/** Parses a five-field crontab expression. Throws InvalidRecurrenceError. */
export function parseCron(expression: string): CronSchedule {
  const parts = String(expression ?? "")
    .trim()
    .split(/\s+/)
    .filter(Boolean);
  if (parts.length !== 5) {
    throw new InvalidRecurrenceError(`cron expression needs 5 fields (minute hour day month weekday), got ${parts.length}`);
  }
  const [minute, hour, dayOfMonth, month, dayOfWeek] = parts.map((p, i) => parseField(p, FIELDS[i]));
  if (dayOfWeek.delete(7)) dayOfWeek.add(0);
  return { expression: parts.join(" "), minute, hour, dayOfMonth, month, dayOfWeek };
}

export function matchesCron(schedule: CronSchedule, t: LocalTime): boolean {
  return (
    schedule.minute.has(t.minute) &&
    schedule.hour.has(t.hour) &&
    schedule.dayOfMonth.has(t.day) &&
    schedule.month.has(t.month) &&
    schedule.dayOfWeek.has(t.weekday)
  );
}

export function localTimeOf(ms: number, timezone: string): LocalTime {
  const dt = DateTime.fromMillis(ms, { zone: timezone });
  return { minute: dt.minute, hour: dt.hour, day: dt.day, month: dt.month, weekday: dt.weekday % 7 };
}

function sorted(values: ReadonlySet<number>): number[] {
  return [...values].sort((a, b) => a - b);
}

/**
 * Earliest instant strictly after `afterMs` whose wall-clock time in `timezone`
 * matches every field. Wall times skipped by a DST gap do not match.
 * Returns null when nothing matches within the search horizon.
 */
export function nextCronFire(schedule: CronSchedule, afterMs: number, timezone: string): number | null {
  const start = DateTime.fromMillis(afterMs, { zone: timezone });
  const end = start.plus({ years: SEARCH_HORIZON_YEARS });
  const hours = sorted(schedule.hour);
  const minutes = sorted(schedule.minute);

  let day = start.startOf("day");
  while (day <= end) {
    if (!schedule.month.has(day.month)) {
      day = day.plus({ months: 1 }).startOf("month");
      continue;
    }
    if (schedule.dayOfMonth.has(day.day) && schedule.dayOfWeek.has(day.weekday % 7)) {
      const sameDay = day.hasSame(start, "day");
      for (const hour of hours) {
        if (sameDay && hour < start.hour) continue;
        for (const minute of minutes) {
          const at = DateTime.fromObject(
            { year: day.year, month: day.month, day: day.day, hour, minute },
            { zone: timezone }
          );
          if (!at.isValid || at.hour !== hour || at.minute !== minute || at.day !== day.day) continue;
          const ms = at.toMillis();
          if (ms > afterMs) return ms;
        }
      }
    }
    day = day.plus({ days: 1 }).startOf("day");
  }
  return null;
}
