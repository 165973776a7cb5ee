export type RecurrenceKind = "once" | "interval" | "cron";

export type Recurrence =
  | { kind: "once" }
  | { kind: "interval"; everyMs: number }
  | { kind: "cron"; expression: string };

export type ReminderTarget = "user" | "room";

export type ReminderRecord = {
  id: string;
  roomId: string;
  creatorId: string;
  target: ReminderTarget;
  text: string;
  recurrence: Recurrence;
  timezone: string;
  createdAtMs: number;
  startAtMs: number;
  // null once the recurrence is exhausted (or never matches)
  nextFireAtMs: number | null;
  isAlarm: boolean;
  alarmRepeatMs: number;
  silenced: boolean;
  // pending alarm repeat; always null while silenced
  alarmNextAtMs: number | null;
  lastFiredAtMs?: number;
};

export type SchedulePatch = Partial<Pick<ReminderRecord, "nextFireAtMs" | "alarmNextAtMs" | "silenced" | "lastFiredAtMs">>;

export type FireKind = "occurrence" | "alarm";

export type Notification = {
  reminderId: string;
  roomId: string;
  creatorId: string;
  target: ReminderTarget;
  text: string;
  kind: FireKind;
  isAlarm: boolean;
  alarmRepeatMs: number;
  firedAtMs: number;
};

export interface Deliverer {
  deliver(notification: Notification): Promise<void>;
}

export type Clock = { now(): number };

export const systemClock: Clock = { now: () => Date.now() };
