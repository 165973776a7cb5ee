import type { AppConfig } from "./config.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import { AlarmController } from "./reminders/alarm.js";
import { SchedulingEngine } from "./reminders/engine.js";
import { ReminderService, type RecoveryReport } from "./reminders/service.js";
import { JsonFileReminderStore, MemoryReminderStore, type ReminderStore } from "./reminders/store.js";
import { systemClock, type Clock, type Deliverer } from "./reminders/types.js";

export type ReminderApp = {
  store: ReminderStore;
  engine: SchedulingEngine;
  service: ReminderService;
  clock: Clock;
};

/** Wires the store, scheduler and lifecycle service for one deliverer. */
export function createReminderApp(
  config: AppConfig,
  deliverer: Deliverer,
  opts: { clock?: Clock; logger?: Logger; store?: ReminderStore } = {}
): ReminderApp {
  const clock = opts.clock ?? systemClock;
  const log = opts.logger ?? defaultLogger;
  const store =
    opts.store ?? (config.REMINDER_STORE === "memory" ? new MemoryReminderStore() : new JsonFileReminderStore(config.DATA_DIR, log));
  const alarms = new AlarmController();

  const engine = new SchedulingEngine({
    store,
    deliverer,
    alarms,
    clock,
    logger: log,
    options: {
      maxSleepMs: config.SCHEDULER_MAX_SLEEP_MS,
      persistAttempts: config.PERSIST_RETRY_ATTEMPTS,
      persistRetryDelayMs: config.PERSIST_RETRY_DELAY_MS,
      deliveryTimeoutMs: config.DELIVERY_TIMEOUT_MS
    }
  });

  const service = new ReminderService({
    store,
    engine,
    alarms,
    clock,
    logger: log,
    settings: {
      timezone: config.TIMEZONE,
      createGraceMs: config.CREATE_GRACE_MS,
      alarmRepeatMs: config.ALARM_REPEAT_MS
    }
  });

  return { store, engine, service, clock };
}

/** Recovers persisted reminders and starts the scheduler timer. */
export async function startReminderApp(app: ReminderApp): Promise<RecoveryReport> {
  const report = await app.service.recover();
  app.engine.start();
  return report;
}
