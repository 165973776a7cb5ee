import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { roomIdOf } from "../../core/rooms.js";
import { InvalidInputError } from "../../errors.js";
import type { ReminderService } from "../../reminders/service.js";
import type { Clock } from "../../reminders/types.js";

export type ReminderToolDeps = { service: ReminderService; clock: Clock };

/** Identifies the chat a tool call acts on. */
export const chatShape = {
  chat_type: z.enum(["private", "group"]),
  user_id: z.string().min(1),
  group_id: z.string().optional()
};

export function roomOf(args: { chat_type: "private" | "group"; user_id: string; group_id?: string }): string {
  const groupId = args.group_id?.trim();
  if (args.chat_type === "group" && !groupId) throw new InvalidInputError("a group chat needs a group_id");
  return roomIdOf({ chatType: args.chat_type, userId: args.user_id.trim(), groupId });
}

export function textResult(text: string, isError = false): CallToolResult {
  return isError ? { content: [{ type: "text", text }], isError: true } : { content: [{ type: "text", text }] };
}
