// Test doubles shared by the reminder tests.
import { silentLogger } from "../logger.js";
import { AlarmController } from "./alarm.js";
import { SchedulingEngine, type EngineOptions } from "./engine.js";
import { ReminderService, type ServiceSettings } from "./service.js";
import { MemoryReminderStore, type ReminderStore } from "./store.js";
import type { Clock, Deliverer, Notification, ReminderRecord, SchedulePatch } from "./types.js";

export const SECOND = 1000;
export const MINUTE = 60 * SECOND;
export const HOUR = 60 * MINUTE;
export const DAY = 24 * HOUR;

export class ManualClock implements Clock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  set(ms: number): void {
    this.current = ms;
  }

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }
}

export class RecordingDeliverer implements Deliverer {
  readonly delivered: Notification[] = [];
  failWith: Error | null = null;

  async deliver(notification: Notification): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.delivered.push(notification);
  }
}

/** Holds deliveries open until `openAll()`; `holds` picks which ones wait. */
export class GatedDeliverer implements Deliverer {
  readonly started: Notification[] = [];
  active = 0;
  maxActive = 0;
  private gates: Array<() => void> = [];
  private waiters: Array<() => void> = [];

  constructor(private readonly holds: (n: Notification) => boolean = () => true) {}

  async deliver(notification: Notification): Promise<void> {
    this.started.push(notification);
    for (const wake of this.waiters.splice(0)) wake();
    if (!this.holds(notification)) return;
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    await new Promise<void>((resolve) => this.gates.push(resolve));
    this.active--;
  }

  async waitForStarted(count: number): Promise<void> {
    while (this.started.length < count) await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  openAll(): void {
    for (const open of this.gates.splice(0)) open();
  }
}

/** Memory store whose writes can be made to fail. */
export class FlakyStore extends MemoryReminderStore {
  failWrites = false;
  writeAttempts = 0;

  override async update(id: string, patch: SchedulePatch): Promise<ReminderRecord | null> {
    this.writeAttempts++;
    if (this.failWrites) throw new Error("disk full");
    return super.update(id, patch);
  }

  override async delete(id: string): Promise<boolean> {
    this.writeAttempts++;
    if (this.failWrites) throw new Error("disk full");
    return super.delete(id);
  }
}

export function makeRecord(overrides: Partial<ReminderRecord> = {}): ReminderRecord {
  return {
    id: "r-1",
    roomId: "group:100",
    creatorId: "42",
    target: "user",
    text: "drink water",
    recurrence: { kind: "once" },
    timezone: "UTC",
    createdAtMs: 0,
    startAtMs: 0,
    nextFireAtMs: 0,
    isAlarm: false,
    alarmRepeatMs: 5 * MINUTE,
    silenced: false,
    alarmNextAtMs: null,
    ...overrides
  };
}

export const testEngineOptions: EngineOptions = {
  maxSleepMs: MINUTE,
  persistAttempts: 2,
  persistRetryDelayMs: 0,
  deliveryTimeoutMs: 5 * SECOND
};

export const testSettings: ServiceSettings = {
  timezone: "UTC",
  createGraceMs: 5 * SECOND,
  alarmRepeatMs: 5 * MINUTE
};

export function makeHarness(opts: { now: number; store?: ReminderStore; settings?: Partial<ServiceSettings> }) {
  const clock = new ManualClock(opts.now);
  const deliverer = new RecordingDeliverer();
  const store = opts.store ?? new MemoryReminderStore();
  const alarms = new AlarmController();
  const engine = new SchedulingEngine({ store, deliverer, alarms, clock, options: testEngineOptions, logger: silentLogger });
  const service = new ReminderService({
    store,
    engine,
    alarms,
    clock,
    logger: silentLogger,
    settings: { ...testSettings, ...opts.settings }
  });
  return { clock, deliverer, store, alarms, engine, service };
}
