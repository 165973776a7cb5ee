import { formatDuration } from "./duration.js";
import type { Notification } from "./types.js";

/** How a transport renders mentions inside a message. */
export type MentionRenderer = {
  user(userId: string): string;
  // empty when the room cannot be pinged as a whole
  room(): string;
};

export const plainMentions: MentionRenderer = {
  user: (userId) => `@${userId}`,
  room: () => "@room"
};

function join(...parts: string[]): string {
  return parts.filter(Boolean).join(" ");
}

export function formatNotification(n: Notification, mention: MentionRenderer, opts: { commandPrefix: string }): string {
  const creator = mention.user(n.creatorId);
  const roomPing = mention.room();
  const who = n.target === "user" ? creator : roomPing || creator;

  if (n.kind === "alarm") {
    return join("Alarm:", who, n.text, `(use ${opts.commandPrefix}silence to silence)`);
  }

  return join(
    who,
    n.text,
    n.target === "room" && roomPing && creator ? `(from ${creator})` : "",
    n.isAlarm ? `(This reminder has an alarm. It will go off again in ${formatDuration(n.alarmRepeatMs)}.)` : ""
  );
}
