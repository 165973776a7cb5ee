import type { ChatEvent, SendTarget } from "../types.js";

// Room ids are "group:<groupId>" or "private:<userId>".

export function roomIdOf(evt: Pick<ChatEvent, "chatType" | "userId" | "groupId">): string {
  if (evt.chatType === "group" && evt.groupId) return `group:${evt.groupId}`;
  return `private:${evt.userId}`;
}

export function parseRoomId(roomId: string): SendTarget {
  const m = String(roomId ?? "").match(/^(group|private):(.+)$/);
  if (!m || !m[2].trim()) throw new Error(`invalid room id '${roomId}'`);
  const id = m[2].trim();
  return m[1] === "group" ? { chatType: "group", groupId: id } : { chatType: "private", userId: id };
}
