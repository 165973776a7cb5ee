import "dotenv/config";
import { NapCatClient } from "./adapters/napcatqq/NapCatClient.js";
import { NapCatHttpSender } from "./adapters/napcatqq/NapCatHttpSender.js";
import { createReminderApp, startReminderApp } from "./app.js";
import { loadConfig } from "./config.js";
import { handleCommand } from "./core/commands.js";
import { logger } from "./logger.js";
import { printError, printInbound } from "./observability/console.js";
import type { SendTarget } from "./types.js";
import { stripSpecificAtMentions } from "./utils/text.js";

const config = loadConfig();

const sender = new NapCatHttpSender(config);
const app = createReminderApp(config, sender);
const napcat = new NapCatClient(config);
const recentMessageIds = new Map<string, number>();

function isDuplicate(messageId: string, nowMs: number): boolean {
  if (!messageId) return false;
  const last = recentMessageIds.get(messageId) ?? 0;
  if (last && nowMs - last < 30_000) return true;
  recentMessageIds.set(messageId, nowMs);
  if (recentMessageIds.size > 2000) {
    for (const [k, v] of recentMessageIds) {
      if (nowMs - v > 120_000) recentMessageIds.delete(k);
    }
  }
  return false;
}

const report = await startReminderApp(app);
logger.info({ restored: report.restored, expired: report.expired.length, timezone: config.TIMEZONE }, "Reminder scheduler started");

napcat.connect(async (evt) => {
  if (isDuplicate(evt.messageId, Date.now())) return;
  printInbound(evt, evt.text.trim() || "[non-text]");

  const botId = napcat.botId;
  const text = botId ? stripSpecificAtMentions(evt.text, [botId]) : evt.text;
  const target: SendTarget =
    evt.chatType === "group" && evt.groupId ? { chatType: "group", groupId: evt.groupId } : { chatType: "private", userId: evt.userId };

  try {
    const result = await handleCommand({ ...evt, text }, { service: app.service, prefix: config.COMMAND_PREFIX, clock: app.clock });
    if (!result.handled) return;
    await sender.send({ target, text: result.replyText });
  } catch (err) {
    printError("handle/send", err);
    logger.error({ err, messageId: evt.messageId }, "handle/send failed");
  }
});

function shutdown(signal: string): void {
  logger.info({ signal }, "Shutting down");
  app.engine.stop();
  napcat.close();
  process.exit(0);
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

logger.info({ wsUrl: config.NAPCAT_WS_URL, prefix: config.COMMAND_PREFIX }, "Bot started");
