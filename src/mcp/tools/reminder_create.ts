import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { formatCreated, formatFailure } from "../../core/replies.js";
import { parseStartTime } from "../../core/timeParser.js";
import { InvalidRecurrenceError, InvalidScheduleError } from "../../errors.js";
import { parseDuration } from "../../reminders/duration.js";
import type { Recurrence } from "../../reminders/types.js";
import { chatShape, roomOf, textResult, type ReminderToolDeps } from "./shared.js";

export function registerReminderCreateTool(server: McpServer, deps: ReminderToolDeps): void {
  server.registerTool(
    "reminder_create",
    {
      title: "Create Reminder",
      description:
        "Create a reminder in a chat. Give `start` for a one-off reminder (\"in 5 minutes\", \"tomorrow at 9am\", \"2026-10-20 09:00\"), " +
        "`every` for a repeating one (\"1 day\", \"2h30m\") or `cron` for a five-field cron expression. Set `alarm` to keep repeating until silenced.",
      inputSchema: {
        ...chatShape,
        text: z.string().min(1),
        target: z.enum(["user", "room"]).optional().default("user"),
        start: z.string().optional(),
        every: z.string().optional(),
        cron: z.string().optional(),
        alarm: z.boolean().optional().default(false)
      }
    },
    async (args) => {
      try {
        const timezone = deps.service.settings.timezone;
        const nowMs = deps.clock.now();

        let startAtMs: number | null = null;
        const start = args.start?.trim();
        if (start) {
          startAtMs = parseStartTime(start, nowMs, timezone);
          if (startAtMs === null) throw new InvalidScheduleError(`could not understand the start time '${start}'`);
        }

        let recurrence: Recurrence = { kind: "once" };
        if (args.cron?.trim()) {
          recurrence = { kind: "cron", expression: args.cron.trim() };
        } else if (args.every?.trim()) {
          const everyMs = parseDuration(args.every);
          if (everyMs === null) throw new InvalidRecurrenceError(`could not understand the recurring time '${args.every}'`);
          recurrence = { kind: "interval", everyMs };
        }

        const rec = await deps.service.create({
          roomId: roomOf(args),
          creatorId: args.user_id.trim(),
          target: args.target,
          text: args.text,
          recurrence,
          startAtMs,
          isAlarm: args.alarm
        });
        return textResult(`${formatCreated(rec)}\nid: ${rec.id}`);
      } catch (e) {
        return textResult(formatFailure(e, "create"), true);
      }
    }
  );
}
