import crypto from "node:crypto";
import { AmbiguousError, InvalidInputError, InvalidRecurrenceError, NotFoundError } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import type { AlarmController } from "./alarm.js";
import type { SchedulingEngine } from "./engine.js";
import { assertNotPast, assertTimezone, MIN_INTERVAL_MS, resolveFirst, resolveNextAfter } from "./resolver.js";
import type { ReminderStore } from "./store.js";
import type { Clock, Recurrence, ReminderRecord, ReminderTarget } from "./types.js";

export type ServiceSettings = {
  timezone: string;
  createGraceMs: number;
  alarmRepeatMs: number;
};

export type CreateReminderInput = {
  roomId: string;
  creatorId: string;
  target: ReminderTarget;
  text: string;
  recurrence: Recurrence;
  startAtMs?: number | null;
  isAlarm?: boolean;
  alarmRepeatMs?: number;
  timezone?: string;
};

export type RecoveryReport = {
  restored: number;
  advanced: string[];
  expired: string[];
};

export type SilenceResult = {
  status: "silenced" | "not_ringing" | "not_alarm";
  reminder: ReminderRecord;
};

const MIN_ID_PREFIX = 4;

export function sortBySchedule(list: ReminderRecord[]): ReminderRecord[] {
  const key = (r: ReminderRecord) => r.nextFireAtMs ?? r.alarmNextAtMs ?? Number.POSITIVE_INFINITY;
  return [...list].sort((a, b) => key(a) - key(b) || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

/**
 * Chooses the reminders of a room that a cancel/silence query refers to:
 * an exact id, otherwise every reminder whose text matches case-insensitively,
 * otherwise every id starting with the query.
 */
export function matchReminders(list: ReminderRecord[], query: string): ReminderRecord[] {
  const q = query.trim();
  if (!q) return [];
  const exact = list.find((r) => r.id === q);
  if (exact) return [exact];
  const byText = list.filter((r) => r.text.trim().toLowerCase() === q.toLowerCase());
  if (byText.length) return byText;
  if (q.length < MIN_ID_PREFIX) return [];
  return list.filter((r) => r.id.startsWith(q));
}

/**
 * Startup recovery and the reminder commands used by the chat and MCP
 * surfaces. Every operation runs inside the engine's serialization point.
 */
export class ReminderService {
  private readonly log: Logger;

  constructor(
    private readonly deps: {
      store: ReminderStore;
      engine: SchedulingEngine;
      alarms: AlarmController;
      clock: Clock;
      settings: ServiceSettings;
      logger?: Logger;
    }
  ) {
    this.log = deps.logger ?? defaultLogger;
  }

  get settings(): ServiceSettings {
    return this.deps.settings;
  }

  /**
   * Loads every stored reminder into the engine. One-off reminders that came
   * due while the process was down are expired rather than fired; recurring
   * ones move to their next future occurrence.
   */
  recover(): Promise<RecoveryReport> {
    const { store, engine, alarms, clock } = this.deps;
    return engine.exclusive(async () => {
      const now = clock.now();
      const report: RecoveryReport = { restored: 0, advanced: [], expired: [] };

      for (const rec of await store.list()) {
        let next: ReminderRecord = rec;

        if (rec.nextFireAtMs !== null && rec.nextFireAtMs <= now) {
          if (rec.recurrence.kind === "once") {
            await engine.persist(rec.id, () => store.delete(rec.id));
            report.expired.push(rec.id);
            this.log.warn({ reminderId: rec.id, roomId: rec.roomId, dueAtMs: rec.nextFireAtMs }, "One-off reminder came due while offline, expiring it");
            continue;
          }
          let nextFireAtMs: number | null = null;
          try {
            nextFireAtMs = resolveNextAfter(rec.recurrence, rec.nextFireAtMs, now, rec.timezone);
          } catch (err) {
            this.log.error({ err, reminderId: rec.id }, "Cannot compute the next occurrence during recovery");
          }
          next = { ...next, nextFireAtMs };
        }

        if (rec.isAlarm && rec.alarmNextAtMs !== null && rec.alarmNextAtMs <= now) {
          next = { ...next, ...alarms.recover(rec, now) };
        }

        if (next !== rec) {
          const patch = { nextFireAtMs: next.nextFireAtMs, alarmNextAtMs: next.alarmNextAtMs, silenced: next.silenced };
          await engine.persist(rec.id, () => store.update(rec.id, patch));
          report.advanced.push(rec.id);
        }
        engine.track(next);
        report.restored++;
      }

      this.log.info({ restored: report.restored, advanced: report.advanced.length, expired: report.expired.length }, "Reminders recovered");
      return report;
    });
  }

  create(input: CreateReminderInput): Promise<ReminderRecord> {
    const { store, engine, clock, settings } = this.deps;
    const text = String(input.text ?? "").trim();
    if (!text) return Promise.reject(new InvalidInputError("the reminder text is empty"));

    return engine.exclusive(async () => {
      const now = clock.now();
      const timezone = input.timezone ?? settings.timezone;
      assertTimezone(timezone);

      const isAlarm = input.isAlarm ?? false;
      const alarmRepeatMs = input.alarmRepeatMs ?? settings.alarmRepeatMs;
      if (isAlarm && (!Number.isFinite(alarmRepeatMs) || alarmRepeatMs < MIN_INTERVAL_MS)) {
        throw new InvalidRecurrenceError("the alarm repeat interval must be at least 1 second");
      }

      const startAtMs = input.startAtMs ?? null;
      const first = resolveFirst(input.recurrence, startAtMs, now, timezone);
      if (first !== null) assertNotPast(first, now, settings.createGraceMs);

      const rec: ReminderRecord = {
        id: crypto.randomUUID(),
        roomId: input.roomId,
        creatorId: input.creatorId,
        target: input.target,
        text,
        recurrence: input.recurrence,
        timezone,
        createdAtMs: now,
        startAtMs: first ?? startAtMs ?? now,
        nextFireAtMs: first,
        isAlarm,
        alarmRepeatMs,
        silenced: false,
        alarmNextAtMs: null
      };

      const saved = await engine.persist(rec.id, () => store.create(rec));
      engine.track(saved);
      this.log.info({ reminderId: rec.id, roomId: rec.roomId, kind: rec.recurrence.kind, nextFireAtMs: first, isAlarm }, "Reminder created");
      return saved;
    });
  }

  list(roomId: string): Promise<ReminderRecord[]> {
    return this.deps.engine.exclusive(async () => sortBySchedule(await this.deps.store.list(roomId)));
  }

  cancel(roomId: string, query: string): Promise<ReminderRecord> {
    const { store, engine } = this.deps;
    return engine.exclusive(async () => {
      const rec = this.pickOne(await store.list(roomId), query);
      const deleted = await engine.persist(rec.id, () => store.delete(rec.id));
      engine.untrack(rec.id);
      if (!deleted) throw new NotFoundError(query);
      this.log.info({ reminderId: rec.id, roomId }, "Reminder cancelled");
      return rec;
    });
  }

  /** An empty query silences the room's only ringing alarm. */
  silence(roomId: string, query: string): Promise<SilenceResult> {
    const { store, engine, alarms } = this.deps;
    return engine.exclusive(async () => {
      const list = await store.list(roomId);
      const rec = query.trim() ? this.pickOne(list, query) : this.pickOne(list.filter((r) => alarms.isRinging(r)), query, true);

      if (!rec.isAlarm) return { status: "not_alarm", reminder: rec };
      if (!alarms.isRinging(rec)) return { status: "not_ringing", reminder: rec };

      const state = alarms.silence();
      const saved = await engine.persist(rec.id, () => store.update(rec.id, state));
      if (!saved) {
        engine.untrack(rec.id);
        throw new NotFoundError(query);
      }
      engine.track(saved);
      this.log.info({ reminderId: rec.id, roomId }, "Alarm silenced");
      return { status: "silenced", reminder: saved };
    });
  }

  private pickOne(list: ReminderRecord[], query: string, preMatched = false): ReminderRecord {
    const matches = preMatched ? list : matchReminders(list, query);
    if (matches.length === 0) throw new NotFoundError(query);
    if (matches.length > 1) throw new AmbiguousError(query, sortBySchedule(matches));
    return matches[0];
  }
}
