import { IANAZone } from "luxon";
import { InvalidRecurrenceError, InvalidScheduleError } from "../errors.js";
import { nextCronFire, parseCron, type CronSchedule } from "./cron.js";
import { formatDuration } from "./duration.js";
import type { Recurrence } from "./types.js";

export const MIN_INTERVAL_MS = 1000;

export function assertTimezone(timezone: string): void {
  if (!IANAZone.isValidZone(timezone)) throw new InvalidRecurrenceError(`unknown timezone '${timezone}'`);
}

/**
 * Checks a recurrence before anything is stored. Returns the parsed cron
 * schedule for cron recurrences.
 */
export function validateRecurrence(recurrence: Recurrence): CronSchedule | null {
  switch (recurrence.kind) {
    case "once":
      return null;
    case "interval": {
      const ms = recurrence.everyMs;
      if (!Number.isFinite(ms) || ms <= 0) throw new InvalidRecurrenceError("the repeat interval must be a positive amount of time");
      if (ms < MIN_INTERVAL_MS) throw new InvalidRecurrenceError("the repeat interval must be at least 1 second");
      return null;
    }
    case "cron":
      return parseCron(recurrence.expression);
  }
}

export function resolveFirst(
  recurrence: Recurrence,
  startAtMs: number | null,
  referenceMs: number,
  timezone: string
): number | null {
  assertTimezone(timezone);
  const cron = validateRecurrence(recurrence);
  switch (recurrence.kind) {
    case "once":
      if (startAtMs === null) throw new InvalidScheduleError("a one-off reminder needs a start time");
      return startAtMs;
    case "interval":
      return startAtMs ?? referenceMs + recurrence.everyMs;
    case "cron": {
      const after = startAtMs === null ? referenceMs : Math.max(referenceMs, startAtMs - 1);
      return cron ? nextCronFire(cron, after, timezone) : null;
    }
  }
}

/** Next occurrence strictly after the one that fired at `priorFireMs`. */
export function resolveNext(recurrence: Recurrence, priorFireMs: number, timezone: string): number | null {
  let next: number | null;
  switch (recurrence.kind) {
    case "once":
      return null;
    case "interval":
      validateRecurrence(recurrence);
      next = priorFireMs + recurrence.everyMs;
      break;
    case "cron":
      next = nextCronFire(parseCron(recurrence.expression), priorFireMs, timezone);
      break;
  }
  if (next !== null && next <= priorFireMs) {
    throw new InvalidRecurrenceError(`recurrence does not advance past ${new Date(priorFireMs).toISOString()}`);
  }
  return next;
}

/**
 * Late-wake variant of resolveNext: the first occurrence strictly after both
 * `priorFireMs` and `nowMs`. Interval reminders keep their phase.
 */
export function resolveNextAfter(recurrence: Recurrence, priorFireMs: number, nowMs: number, timezone: string): number | null {
  if (recurrence.kind === "interval") {
    const next = resolveNext(recurrence, priorFireMs, timezone);
    if (next === null || next > nowMs) return next;
    const steps = Math.floor((nowMs - priorFireMs) / recurrence.everyMs) + 1;
    return priorFireMs + steps * recurrence.everyMs;
  }
  return resolveNext(recurrence, Math.max(priorFireMs, nowMs), timezone);
}

export function assertNotPast(firstFireMs: number, nowMs: number, graceMs: number): void {
  if (firstFireMs < nowMs - graceMs) {
    const ago = formatDuration(nowMs - firstFireMs);
    throw new InvalidScheduleError(`the first reminder time is in the past (${ago} ago)`);
  }
}
