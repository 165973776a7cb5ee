import path from "node:path";
import { IANAZone } from "luxon";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { projectRootDir } from "./utils/fs.js";

function normalizeSecret(v: unknown): unknown {
  if (typeof v !== "string") return v;
  const s = v.trim();
  const m1 = s.match(/^["']([\s\S]*)["']$/);
  const v1 = (m1 ? m1[1] : s).trim();
  const m2 = v1.match(/^`([\s\S]*)`$/);
  return (m2 ? m2[1] : v1).trim();
}

function emptyToUndefined(v: unknown): unknown {
  return typeof v === "string" && !v.trim() ? undefined : v;
}

const envSchema = z.object({
  NAPCAT_HTTP_URL: z.string().url().default("http://127.0.0.1:3000"),
  NAPCAT_WS_URL: z.string().url().default("ws://127.0.0.1:3001"),
  NAPCAT_HTTP_TOKEN: z.preprocess((v) => emptyToUndefined(normalizeSecret(v)), z.string().min(1).optional()),
  NAPCAT_WS_TOKEN: z.preprocess((v) => emptyToUndefined(normalizeSecret(v)), z.string().min(1).optional()),
  BOT_QQ_ID: z.preprocess(emptyToUndefined, z.string().optional()),

  COMMAND_PREFIX: z.string().min(1).default("!"),

  DATA_DIR: z.string().default("data"),
  REMINDER_STORE: z.enum(["file", "memory"]).default("file"),

  TIMEZONE: z
    .string()
    .default("UTC")
    .refine((tz) => IANAZone.isValidZone(tz), { message: "must be an IANA timezone such as Europe/London" }),
  ALARM_REPEAT_MS: z.coerce.number().int().min(1000).max(86_400_000).default(300_000),
  CREATE_GRACE_MS: z.coerce.number().int().min(0).max(3_600_000).default(5000),

  SCHEDULER_MAX_SLEEP_MS: z.coerce.number().int().min(100).max(3_600_000).default(60_000),
  PERSIST_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(3),
  PERSIST_RETRY_DELAY_MS: z.coerce.number().int().min(0).max(60_000).default(200),
  DELIVERY_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120_000).default(15_000)
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const env: Record<string, unknown> = { ...source };
  if (env.NAPCAT_ACCESS_TOKEN) {
    if (!env.NAPCAT_HTTP_TOKEN) env.NAPCAT_HTTP_TOKEN = env.NAPCAT_ACCESS_TOKEN;
    if (!env.NAPCAT_WS_TOKEN) env.NAPCAT_WS_TOKEN = env.NAPCAT_ACCESS_TOKEN;
  }

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const cfg = parsed.data;
  cfg.DATA_DIR = path.isAbsolute(cfg.DATA_DIR) ? cfg.DATA_DIR : path.resolve(projectRootDir(), cfg.DATA_DIR);
  return cfg;
}
