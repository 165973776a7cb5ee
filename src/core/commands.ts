import { logger } from "../logger.js";
import { parseDuration } from "../reminders/duration.js";
import type { ReminderService } from "../reminders/service.js";
import type { Clock, Recurrence, ReminderTarget } from "../reminders/types.js";
import type { ChatEvent } from "../types.js";
import { formatCancelled, formatCreated, formatFailure, formatList, formatSilence, helpText } from "./replies.js";
import { roomIdOf } from "./rooms.js";
import { parseStartTime } from "./timeParser.js";

export type CommandResult = { handled: true; replyText: string } | { handled: false };

export type ParsedCommand =
  | { type: "create"; target: ReminderTarget; isAlarm: boolean; recurrence: Recurrence; startAtMs: number | null; text: string }
  | { type: "list" }
  | { type: "cancel"; query: string }
  | { type: "silence"; query: string }
  | { type: "help"; topic?: string }
  | { type: "unknown"; name: string };

/** The command was recognised but its arguments are malformed; the message is the reply. */
export class CommandSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CommandSyntaxError";
  }
}

const CREATE_COMMANDS: Record<string, { target: ReminderTarget; isAlarm: boolean }> = {
  remindme: { target: "user", isAlarm: false },
  remindroom: { target: "room", isAlarm: false },
  alarmme: { target: "user", isAlarm: true },
  alarmroom: { target: "room", isAlarm: true }
};

const LIST_COMMANDS = new Set(["listreminders", "listalarms"]);

const CANCEL_COMMANDS = new Set(
  ["cancel", "del", "delete", "remove"].flatMap((verb) => [`${verb}reminder`, `${verb}alarm`])
);

function splitOnce(s: string, sep: string): [string, string] | null {
  const i = s.indexOf(sep);
  if (i < 0) return null;
  return [s.slice(0, i).trim(), s.slice(i + sep.length).trim()];
}

function parseCreateArgs(
  name: string,
  args: string,
  opts: { prefix: string; nowMs: number; timezone: string }
): { recurrence: Recurrence; startAtMs: number | null; text: string } {
  const usage = `Usage: ${opts.prefix}${name} [every <recurring time>;] <start time>; <reminder text>`;
  const lower = args.toLowerCase();

  if (/^cron\s/.test(lower)) {
    const parts = splitOnce(args.slice(4), ";");
    if (!parts) throw new CommandSyntaxError(`Usage: ${opts.prefix}${name} cron <min> <hour> <day of month> <month> <day of week>; <reminder text>`);
    return { recurrence: { kind: "cron", expression: parts[0] }, startAtMs: null, text: parts[1] };
  }

  if (/^every\s/.test(lower)) {
    const parts = splitOnce(args.slice(5), ";");
    if (!parts) throw new CommandSyntaxError(usage);
    const everyMs = parseDuration(parts[0]);
    if (everyMs === null) throw new CommandSyntaxError(`I could not understand the recurring time '${parts[0]}'.`);

    const rest = splitOnce(parts[1], ";");
    const startAtMs = rest ? parseStartTime(rest[0], opts.nowMs, opts.timezone) : null;
    if (rest && startAtMs !== null) return { recurrence: { kind: "interval", everyMs }, startAtMs, text: rest[1] };
    return { recurrence: { kind: "interval", everyMs }, startAtMs: null, text: parts[1] };
  }

  const parts = splitOnce(args, ";");
  if (!parts) throw new CommandSyntaxError(usage);
  const startAtMs = parseStartTime(parts[0], opts.nowMs, opts.timezone);
  if (startAtMs === null) throw new CommandSyntaxError(`I could not understand the start time '${parts[0]}'.`);
  return { recurrence: { kind: "once" }, startAtMs, text: parts[1] };
}

/**
 * Parses a prefixed chat command. Returns null when the text is not a
 * command at all.
 */
export function parseCommand(text: string, opts: { prefix: string; nowMs: number; timezone: string }): ParsedCommand | null {
  const t = String(text ?? "").trim();
  if (!t.startsWith(opts.prefix)) return null;
  const body = t.slice(opts.prefix.length);
  const m = body.match(/^(\S+)\s*([\s\S]*)$/);
  if (!m) return null;
  const name = m[1].toLowerCase();
  const args = m[2].trim();

  if (Object.hasOwn(CREATE_COMMANDS, name)) {
    const { target, isAlarm } = CREATE_COMMANDS[name];
    return { type: "create", target, isAlarm, ...parseCreateArgs(name, args, opts) };
  }
  if (LIST_COMMANDS.has(name)) return { type: "list" };
  if (CANCEL_COMMANDS.has(name)) {
    if (!args) throw new CommandSyntaxError(`Usage: ${opts.prefix}${name} <reminder text>`);
    return { type: "cancel", query: args };
  }
  if (name === "silence") return { type: "silence", query: args };
  if (name === "help") return { type: "help", topic: args.split(/\s+/)[0] || undefined };
  return { type: "unknown", name };
}

export async function handleCommand(
  evt: ChatEvent,
  deps: { service: ReminderService; prefix: string; clock: Clock }
): Promise<CommandResult> {
  const { service, prefix, clock } = deps;
  const roomId = roomIdOf(evt);

  let cmd: ParsedCommand | null;
  try {
    cmd = parseCommand(evt.text, { prefix, nowMs: clock.now(), timezone: service.settings.timezone });
  } catch (e) {
    if (e instanceof CommandSyntaxError) return { handled: true, replyText: e.message };
    throw e;
  }
  if (!cmd) return { handled: false };

  switch (cmd.type) {
    case "create":
      try {
        const rec = await service.create({
          roomId,
          creatorId: evt.userId,
          target: cmd.target,
          text: cmd.text,
          recurrence: cmd.recurrence,
          startAtMs: cmd.startAtMs,
          isAlarm: cmd.isAlarm
        });
        return { handled: true, replyText: formatCreated(rec) };
      } catch (e) {
        logger.warn({ err: e, roomId }, "Create reminder failed");
        return { handled: true, replyText: formatFailure(e, "create") };
      }
    case "list":
      try {
        return { handled: true, replyText: formatList(await service.list(roomId)) };
      } catch (e) {
        logger.warn({ err: e, roomId }, "List reminders failed");
        return { handled: true, replyText: formatFailure(e, "list") };
      }
    case "cancel":
      try {
        await service.cancel(roomId, cmd.query);
        return { handled: true, replyText: formatCancelled() };
      } catch (e) {
        return { handled: true, replyText: formatFailure(e, "cancel") };
      }
    case "silence":
      try {
        return { handled: true, replyText: formatSilence(await service.silence(roomId, cmd.query)) };
      } catch (e) {
        return { handled: true, replyText: formatFailure(e, "silence") };
      }
    case "help":
      return { handled: true, replyText: helpText(prefix, cmd.topic) };
    case "unknown":
      return { handled: true, replyText: `Unknown command '${cmd.name}'. Try the '${prefix}help' command for more information.` };
  }
}
