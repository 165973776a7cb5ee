export type ChatType = "private" | "group";

// OneBot 11 message segment, e.g. { type: "text", data: { text } } or { type: "at", data: { qq } }
export type MessageSegment = { type: string; data: Record<string, unknown> };

export type ChatEvent = {
  platform: "napcatqq";
  chatType: ChatType;
  messageId: string;
  userId: string;
  groupId?: string;
  text: string;
  timestampMs: number;
};

export type SendTarget =
  | { chatType: "private"; userId: string }
  | { chatType: "group"; groupId: string };

export type SendMessage = {
  target: SendTarget;
  text: string;
};
