import WebSocket from "ws";
import { z } from "zod";
import { logger } from "../../logger.js";
import type { AppConfig } from "../../config.js";
import type { ChatEvent } from "../../types.js";
import { normalizeSegments, segmentsToText } from "../../utils/text.js";

const oneBotIdSchema = z.union([z.number(), z.string()]);

const oneBotMessageEventSchema = z.object({
  post_type: z.literal("message"),
  time: z.number(),
  self_id: oneBotIdSchema,
  message_type: z.union([z.literal("private"), z.literal("group")]),
  message_id: oneBotIdSchema,
  user_id: oneBotIdSchema,
  group_id: oneBotIdSchema.optional(),
  message: z.unknown(),
  raw_message: z.string().optional()
});

export type OneBotMessageEvent = z.infer<typeof oneBotMessageEventSchema>;

export function toChatEvent(e: OneBotMessageEvent): ChatEvent {
  const text = segmentsToText(normalizeSegments(e.message)) || e.raw_message || "";
  return {
    platform: "napcatqq",
    chatType: e.message_type,
    messageId: String(e.message_id),
    userId: String(e.user_id),
    groupId: e.group_id !== undefined ? String(e.group_id) : undefined,
    text,
    timestampMs: e.time * 1000
  };
}

function rawDataToText(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
}

/** Receives chat messages from the NapCat WebSocket and reconnects when it drops. */
export class NapCatClient {
  private ws?: WebSocket;
  private readonly wsUrl: string;
  private readonly wsToken?: string;
  private selfId?: string;
  private closed = false;

  constructor(config: Pick<AppConfig, "NAPCAT_WS_URL" | "NAPCAT_WS_TOKEN" | "BOT_QQ_ID">) {
    this.wsUrl = config.NAPCAT_WS_URL.replace(/\/+$/, "");
    this.wsToken = config.NAPCAT_WS_TOKEN;
    this.selfId = config.BOT_QQ_ID;
  }

  get botId(): string | undefined {
    return this.selfId;
  }

  connect(onEvent: (evt: ChatEvent) => Promise<void>): void {
    const headers: Record<string, string> = {};
    if (this.wsToken) headers["Authorization"] = `Bearer ${this.wsToken}`;

    this.closed = false;
    this.ws = new WebSocket(this.wsUrl, { headers });

    this.ws.on("open", () => {
      logger.info({ wsUrl: this.wsUrl }, "NapCat WebSocket connected");
    });

    this.ws.on("close", (code: number, reason: Buffer) => {
      logger.debug({ code, reason: String(reason) }, "NapCat WebSocket closed");
      if (!this.closed) setTimeout(() => this.connect(onEvent), 1500);
    });

    this.ws.on("error", (err: Error) => {
      logger.error({ err }, "NapCat WebSocket error");
    });

    this.ws.on("message", (data: WebSocket.RawData) => {
      const rawText = rawDataToText(data);
      let json: unknown;
      try {
        json = JSON.parse(rawText);
      } catch {
        logger.debug({ size: rawText.length }, "Ignoring non-JSON WebSocket frame");
        return;
      }

      const parsed = oneBotMessageEventSchema.safeParse(json);
      if (!parsed.success) return;

      const evt = toChatEvent(parsed.data);
      if (!this.selfId) this.selfId = String(parsed.data.self_id);
      if (evt.userId === this.selfId) return;
      onEvent(evt).catch((err) => logger.error({ err, messageId: evt.messageId }, "Handle event failed"));
    });
  }

  close(): void {
    this.closed = true;
    this.ws?.close();
  }
}
