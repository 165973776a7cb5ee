import { DeliveryFailedError, InvalidRecurrenceError, isReminderError, PersistenceFailedError, type ReminderError } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import { errorMessage, Mutex, retry, withTimeout } from "../utils/async.js";
import type { AlarmController } from "./alarm.js";
import { FireQueue, type FireEntry } from "./queue.js";
import { resolveNextAfter } from "./resolver.js";
import type { ReminderStore } from "./store.js";
import type { Clock, Deliverer, FireKind, Notification, ReminderRecord } from "./types.js";

export type EngineOptions = {
  maxSleepMs: number;
  persistAttempts: number;
  persistRetryDelayMs: number;
  deliveryTimeoutMs: number;
};

export type EngineDeps = {
  store: ReminderStore;
  deliverer: Deliverer;
  alarms: AlarmController;
  clock: Clock;
  options: EngineOptions;
  logger?: Logger;
};

export type FireOutcome = {
  reminderId: string;
  kind: FireKind;
  scheduledAtMs: number;
  firedAtMs: number;
  status: "delivered" | "delivery_failed" | "halted";
  error?: ReminderError;
  nextFireAtMs: number | null;
  alarmNextAtMs: number | null;
  terminal: boolean;
};

type PlannedFire = {
  entry: FireEntry;
  // null when the reminder is terminal and gets deleted
  next: ReminderRecord | null;
  notification: Notification;
  firedAtMs: number;
};

function copy(rec: ReminderRecord): ReminderRecord {
  return { ...rec, recurrence: { ...rec.recurrence } };
}

/**
 * Owns the in-memory schedule: an arena of tracked reminders and a heap of
 * their pending fire events. Every read or write of that state goes through
 * `exclusive()`; deliveries run outside of it.
 */
export class SchedulingEngine {
  private readonly queue = new FireQueue();
  private readonly records = new Map<string, ReminderRecord>();
  private readonly haltedIds = new Set<string>();
  private readonly inFlight = new Set<string>();
  private readonly deferred = new Set<string>();
  private readonly lock = new Mutex();
  private readonly log: Logger;
  private timer?: NodeJS.Timeout;
  private running = false;

  constructor(private readonly deps: EngineDeps) {
    this.log = deps.logger ?? defaultLogger;
  }

  exclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    return this.lock.runExclusive(fn);
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.arm();
  }

  stop(): void {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
  }

  // The methods below mutate scheduling state; call them inside exclusive().

  /** Adds or replaces a reminder and its fire events. */
  track(rec: ReminderRecord): void {
    this.records.set(rec.id, copy(rec));
    this.haltedIds.delete(rec.id);
    this.requeue(rec);
    this.arm();
  }

  untrack(id: string): boolean {
    const had = this.records.delete(id);
    this.queue.remove(id);
    this.haltedIds.delete(id);
    this.deferred.delete(id);
    this.arm();
    return had;
  }

  tracked(id: string): ReminderRecord | undefined {
    const rec = this.records.get(id);
    return rec ? copy(rec) : undefined;
  }

  pending(): FireEntry[] {
    return this.queue.entries();
  }

  halted(): string[] {
    return [...this.haltedIds];
  }

  /** Runs a store write with retries; throws PersistenceFailedError when every attempt fails. */
  async persist<T>(reminderId: string, op: () => Promise<T>): Promise<T> {
    const { persistAttempts, persistRetryDelayMs } = this.deps.options;
    try {
      return await retry(op, {
        attempts: persistAttempts,
        delayMs: persistRetryDelayMs,
        onRetry: (err, attempt) => this.log.warn({ err, reminderId, attempt }, "Reminder write failed, retrying")
      });
    } catch (err) {
      throw new PersistenceFailedError(reminderId, Math.max(1, persistAttempts), err);
    }
  }

  /**
   * One scheduler wake: fires every reminder that is due, at most once per
   * reminder, then delivers the notifications.
   */
  async wake(): Promise<FireOutcome[]> {
    const { fires, halted } = await this.lock.runExclusive(async () => {
      const due = await this.collectDue();
      // armed before delivery so a slow deliverer does not hold back other reminders
      this.arm();
      return due;
    });
    const delivered = await Promise.all(fires.map((f) => this.dispatch(f)));
    return [...halted, ...delivered];
  }

  private requeue(rec: ReminderRecord): void {
    this.queue.remove(rec.id);
    if (rec.nextFireAtMs !== null) this.queue.upsert({ reminderId: rec.id, kind: "occurrence", atMs: rec.nextFireAtMs });
    if (rec.isAlarm && !rec.silenced && rec.alarmNextAtMs !== null) {
      this.queue.upsert({ reminderId: rec.id, kind: "alarm", atMs: rec.alarmNextAtMs });
    }
  }

  private async collectDue(): Promise<{ fires: PlannedFire[]; halted: FireOutcome[] }> {
    const now = this.deps.clock.now();
    const byReminder = new Map<string, FireEntry[]>();
    for (const entry of this.queue.popDue(now)) {
      const list = byReminder.get(entry.reminderId) ?? [];
      list.push(entry);
      byReminder.set(entry.reminderId, list);
    }

    const fires: PlannedFire[] = [];
    const halted: FireOutcome[] = [];
    for (const [id, entries] of byReminder) {
      if (this.inFlight.has(id)) {
        this.deferred.add(id);
        continue;
      }
      const rec = this.records.get(id);
      if (!rec) continue;

      const entry = entries.find((e) => e.kind === "occurrence") ?? entries[0];
      const haltedOutcome = (error: ReminderError): FireOutcome => ({
        reminderId: id,
        kind: entry.kind,
        scheduledAtMs: entry.atMs,
        firedAtMs: now,
        status: "halted",
        error,
        nextFireAtMs: rec.nextFireAtMs,
        alarmNextAtMs: rec.alarmNextAtMs,
        terminal: false
      });

      let plan: PlannedFire;
      try {
        plan = this.plan(rec, entry, now);
      } catch (err) {
        const failure = isReminderError(err) ? err : new InvalidRecurrenceError(`cannot compute the next occurrence: ${errorMessage(err)}`);
        this.halt(id, failure, "Halting reminder: its next occurrence cannot be computed");
        halted.push(haltedOutcome(failure));
        continue;
      }

      let stored = false;
      try {
        stored = await this.persist(id, () => this.write(id, plan.next));
      } catch (err) {
        const failure = err instanceof PersistenceFailedError ? err : new PersistenceFailedError(id, 1, err);
        this.halt(id, failure, "Halting reminder: its schedule could not be persisted");
        halted.push(haltedOutcome(failure));
        continue;
      }

      if (!stored) {
        this.log.info({ reminderId: id }, "Reminder vanished from the store before firing, dropping it");
        this.records.delete(id);
        continue;
      }

      if (plan.next) {
        this.records.set(id, copy(plan.next));
        this.requeue(plan.next);
      } else {
        this.records.delete(id);
      }
      this.inFlight.add(id);
      fires.push(plan);
    }
    return { fires, halted };
  }

  private plan(rec: ReminderRecord, entry: FireEntry, now: number): PlannedFire {
    let next: ReminderRecord | null;
    if (entry.kind === "occurrence") {
      // Throws when the recurrence cannot advance; the caller halts the reminder.
      const nextFireAtMs = resolveNextAfter(rec.recurrence, entry.atMs, now, rec.timezone);
      if (rec.isAlarm) {
        next = { ...copy(rec), nextFireAtMs, ...this.deps.alarms.onOccurrence(rec, entry.atMs, now), lastFiredAtMs: now };
      } else {
        next = nextFireAtMs === null ? null : { ...copy(rec), nextFireAtMs, lastFiredAtMs: now };
      }
    } else {
      next = { ...copy(rec), ...this.deps.alarms.onRepeat(rec, entry.atMs, now), lastFiredAtMs: now };
    }

    return {
      entry,
      next,
      firedAtMs: now,
      notification: {
        reminderId: rec.id,
        roomId: rec.roomId,
        creatorId: rec.creatorId,
        target: rec.target,
        text: rec.text,
        kind: entry.kind,
        isAlarm: rec.isAlarm,
        alarmRepeatMs: rec.alarmRepeatMs,
        firedAtMs: now
      }
    };
  }

  /** False when the reminder no longer exists in the store. */
  private async write(id: string, next: ReminderRecord | null): Promise<boolean> {
    if (next === null) return this.deps.store.delete(id);
    const saved = await this.deps.store.update(id, {
      nextFireAtMs: next.nextFireAtMs,
      alarmNextAtMs: next.alarmNextAtMs,
      silenced: next.silenced,
      lastFiredAtMs: next.lastFiredAtMs
    });
    return saved !== null;
  }

  private halt(id: string, err: ReminderError, message: string): void {
    this.queue.remove(id);
    this.haltedIds.add(id);
    this.log.error({ err, reminderId: id }, message);
  }

  private async dispatch(plan: PlannedFire): Promise<FireOutcome> {
    const { entry, next, notification } = plan;
    const base = {
      reminderId: entry.reminderId,
      kind: entry.kind,
      scheduledAtMs: entry.atMs,
      firedAtMs: plan.firedAtMs,
      nextFireAtMs: next?.nextFireAtMs ?? null,
      alarmNextAtMs: next?.alarmNextAtMs ?? null,
      terminal: next === null
    };
    try {
      await withTimeout(this.deps.deliverer.deliver(notification), this.deps.options.deliveryTimeoutMs, "reminder delivery");
      this.log.info({ reminderId: entry.reminderId, kind: entry.kind, roomId: notification.roomId }, "Reminder fired");
      return { ...base, status: "delivered" };
    } catch (err) {
      const failure = new DeliveryFailedError(entry.reminderId, err);
      this.log.warn({ err, reminderId: entry.reminderId, roomId: notification.roomId }, "Reminder delivery failed, not retrying");
      return { ...base, status: "delivery_failed", error: failure };
    } finally {
      await this.lock.runExclusive(() => this.release(entry.reminderId));
    }
  }

  private release(id: string): void {
    this.inFlight.delete(id);
    if (!this.deferred.delete(id)) return;
    const rec = this.records.get(id);
    if (rec && !this.haltedIds.has(id)) this.requeue(rec);
    this.arm();
  }

  private arm(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    if (!this.running) return;
    const next = this.queue.peek();
    if (!next) return;
    const delayMs = Math.max(0, Math.min(next.atMs - this.deps.clock.now(), this.deps.options.maxSleepMs));
    this.timer = setTimeout(() => {
      this.timer = undefined;
      void this.wake().catch((err) => this.log.error({ err }, "Scheduler wake failed"));
    }, delayMs);
  }
}
