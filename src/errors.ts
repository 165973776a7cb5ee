import type { ReminderRecord } from "./reminders/types.js";

export type ReminderErrorCode =
  | "INVALID_INPUT"
  | "INVALID_RECURRENCE"
  | "INVALID_SCHEDULE"
  | "NOT_FOUND"
  | "AMBIGUOUS"
  | "DELIVERY_FAILED"
  | "PERSISTENCE_FAILED";

export class ReminderError extends Error {
  constructor(
    readonly code: ReminderErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends ReminderError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
  }
}

/** Recurrence spec that can never produce a usable schedule (bad interval, bad cron, bad zone). */
export class InvalidRecurrenceError extends ReminderError {
  constructor(message: string) {
    super("INVALID_RECURRENCE", message);
  }
}

/** First fire instant is missing or already in the past. */
export class InvalidScheduleError extends ReminderError {
  constructor(message: string) {
    super("INVALID_SCHEDULE", message);
  }
}

export class NotFoundError extends ReminderError {
  constructor(readonly query: string) {
    super("NOT_FOUND", `no reminder matches '${query}'`);
  }
}

export class AmbiguousError extends ReminderError {
  constructor(
    readonly query: string,
    readonly candidates: ReminderRecord[]
  ) {
    super("AMBIGUOUS", `${candidates.length} reminders match '${query}'`);
  }
}

export class DeliveryFailedError extends ReminderError {
  constructor(
    readonly reminderId: string,
    cause: unknown
  ) {
    super("DELIVERY_FAILED", `delivery of reminder ${reminderId} failed`, { cause });
  }
}

export class PersistenceFailedError extends ReminderError {
  constructor(
    readonly reminderId: string,
    readonly attempts: number,
    cause: unknown
  ) {
    super("PERSISTENCE_FAILED", `persisting reminder ${reminderId} failed after ${attempts} attempt(s)`, { cause });
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Configuration error:\n${issues.join("\n")}`);
    this.name = "ConfigError";
  }
}

export function isReminderError(e: unknown): e is ReminderError {
  return e instanceof ReminderError;
}
