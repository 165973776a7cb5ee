import path from "node:path";
import { z } from "zod";
import { logger as defaultLogger, type Logger } from "../logger.js";
import { atomicWriteJson, readJsonFile } from "../utils/fs.js";
import type { ReminderRecord, SchedulePatch } from "./types.js";

const recurrenceSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("once") }),
  z.object({ kind: z.literal("interval"), everyMs: z.number().positive() }),
  z.object({ kind: z.literal("cron"), expression: z.string().min(1) })
]);

export const reminderRecordSchema = z.object({
  id: z.string().min(1),
  roomId: z.string().min(1),
  creatorId: z.string().min(1),
  target: z.enum(["user", "room"]),
  text: z.string(),
  recurrence: recurrenceSchema,
  timezone: z.string().min(1),
  createdAtMs: z.number(),
  startAtMs: z.number(),
  nextFireAtMs: z.number().nullable(),
  isAlarm: z.boolean(),
  alarmRepeatMs: z.number().positive(),
  silenced: z.boolean(),
  alarmNextAtMs: z.number().nullable(),
  lastFiredAtMs: z.number().optional()
});

function copy(rec: ReminderRecord): ReminderRecord {
  return { ...rec, recurrence: { ...rec.recurrence } };
}

function byRoom(roomId: string | undefined): (r: ReminderRecord) => boolean {
  return (r) => roomId === undefined || r.roomId === roomId;
}

/**
 * Durable table of reminders. Every method resolves only after the change is
 * persisted; `list` returns a snapshot that later mutations do not affect.
 */
export abstract class ReminderStore {
  abstract create(rec: ReminderRecord): Promise<ReminderRecord>;
  abstract get(id: string): Promise<ReminderRecord | null>;
  abstract list(roomId?: string): Promise<ReminderRecord[]>;
  abstract update(id: string, patch: SchedulePatch): Promise<ReminderRecord | null>;
  abstract delete(id: string): Promise<boolean>;

  updateNextFire(id: string, nextFireAtMs: number | null): Promise<ReminderRecord | null> {
    return this.update(id, { nextFireAtMs });
  }

  setSilenced(id: string, silenced: boolean): Promise<ReminderRecord | null> {
    return this.update(id, silenced ? { silenced, alarmNextAtMs: null } : { silenced });
  }
}

export class MemoryReminderStore extends ReminderStore {
  protected readonly rows = new Map<string, ReminderRecord>();

  async create(rec: ReminderRecord): Promise<ReminderRecord> {
    if (this.rows.has(rec.id)) throw new Error(`reminder ${rec.id} already exists`);
    this.rows.set(rec.id, copy(rec));
    return copy(rec);
  }

  async get(id: string): Promise<ReminderRecord | null> {
    const rec = this.rows.get(id);
    return rec ? copy(rec) : null;
  }

  async list(roomId?: string): Promise<ReminderRecord[]> {
    return [...this.rows.values()].filter(byRoom(roomId)).map(copy);
  }

  async update(id: string, patch: SchedulePatch): Promise<ReminderRecord | null> {
    const rec = this.rows.get(id);
    if (!rec) return null;
    const next = { ...copy(rec), ...patch };
    this.rows.set(id, next);
    return copy(next);
  }

  async delete(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }
}

/** Stores all reminders in `<dataDir>/reminders.json`, rewritten atomically on every mutation. */
export class JsonFileReminderStore extends ReminderStore {
  readonly filePath: string;
  private reminders: ReminderRecord[];

  constructor(
    dataDir: string,
    private readonly log: Logger = defaultLogger
  ) {
    super();
    this.filePath = path.join(dataDir, "reminders.json");
    this.reminders = this.load();
  }

  private load(): ReminderRecord[] {
    const raw = readJsonFile(this.filePath);
    if (raw === undefined) return [];
    if (!Array.isArray(raw)) throw new Error(`${this.filePath} does not contain a reminder list`);
    const out: ReminderRecord[] = [];
    for (const row of raw) {
      const parsed = reminderRecordSchema.safeParse(row);
      if (parsed.success) out.push(parsed.data);
      else this.log.warn({ file: this.filePath, issues: parsed.error.issues.map((i) => i.message) }, "Skipping invalid reminder row");
    }
    return out;
  }

  private flush(rows: ReminderRecord[]): void {
    atomicWriteJson(this.filePath, rows);
    this.reminders = rows;
  }

  async create(rec: ReminderRecord): Promise<ReminderRecord> {
    if (this.reminders.some((r) => r.id === rec.id)) throw new Error(`reminder ${rec.id} already exists`);
    this.flush([...this.reminders, copy(rec)]);
    return copy(rec);
  }

  async get(id: string): Promise<ReminderRecord | null> {
    const rec = this.reminders.find((r) => r.id === id);
    return rec ? copy(rec) : null;
  }

  async list(roomId?: string): Promise<ReminderRecord[]> {
    return this.reminders.filter(byRoom(roomId)).map(copy);
  }

  async update(id: string, patch: SchedulePatch): Promise<ReminderRecord | null> {
    const i = this.reminders.findIndex((r) => r.id === id);
    if (i < 0) return null;
    const next = { ...copy(this.reminders[i]), ...patch };
    const rows = [...this.reminders];
    rows[i] = next;
    this.flush(rows);
    return copy(next);
  }

  async delete(id: string): Promise<boolean> {
    const rows = this.reminders.filter((r) => r.id !== id);
    if (rows.length === this.reminders.length) return false;
    this.flush(rows);
    return true;
  }
}
