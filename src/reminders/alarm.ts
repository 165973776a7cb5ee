import type { ReminderRecord } from "./types.js";

export type AlarmState = Pick<ReminderRecord, "silenced" | "alarmNextAtMs">;

/** First point of the grid `firedAtMs + k * repeatMs` (k >= 1) strictly after `nowMs`. */
export function nextOnGrid(firedAtMs: number, repeatMs: number, nowMs: number): number {
  const first = firedAtMs + repeatMs;
  if (first > nowMs) return first;
  return firedAtMs + (Math.floor((nowMs - firedAtMs) / repeatMs) + 1) * repeatMs;
}

/**
 * Alarm repeat policy. An alarm rings again every `alarmRepeatMs` after its
 * reminder fires, until silenced; the next firing of the underlying
 * recurrence re-arms it.
 */
export class AlarmController {
  isRinging(rec: ReminderRecord): boolean {
    return rec.isAlarm && !rec.silenced && rec.alarmNextAtMs !== null;
  }

  onOccurrence(rec: ReminderRecord, firedAtMs: number, nowMs: number): AlarmState {
    if (!rec.silenced && rec.alarmNextAtMs !== null && rec.alarmNextAtMs > nowMs) {
      return { silenced: false, alarmNextAtMs: rec.alarmNextAtMs };
    }
    return { silenced: false, alarmNextAtMs: nextOnGrid(firedAtMs, rec.alarmRepeatMs, nowMs) };
  }

  onRepeat(rec: ReminderRecord, firedAtMs: number, nowMs: number): AlarmState {
    if (rec.silenced) return { silenced: true, alarmNextAtMs: null };
    return { silenced: false, alarmNextAtMs: nextOnGrid(firedAtMs, rec.alarmRepeatMs, nowMs) };
  }

  /** Brings a ringing alarm whose repeat passed during downtime back onto its grid. */
  recover(rec: ReminderRecord, nowMs: number): AlarmState {
    if (rec.silenced || rec.alarmNextAtMs === null) return { silenced: rec.silenced, alarmNextAtMs: null };
    if (rec.alarmNextAtMs > nowMs) return { silenced: false, alarmNextAtMs: rec.alarmNextAtMs };
    return { silenced: false, alarmNextAtMs: nextOnGrid(rec.alarmNextAtMs - rec.alarmRepeatMs, rec.alarmRepeatMs, nowMs) };
  }

  silence(): AlarmState {
    return { silenced: true, alarmNextAtMs: null };
  }
}
