import type { AppConfig } from "../../config.js";
import { parseRoomId } from "../../core/rooms.js";
import { formatNotification, type MentionRenderer } from "../../reminders/notify.js";
import type { Deliverer, Notification } from "../../reminders/types.js";
import type { SendMessage, SendTarget } from "../../types.js";
import { printOutbound } from "../../observability/console.js";

export function cqMentions(target: SendTarget): MentionRenderer {
  return {
    user: (userId) => (target.chatType === "group" ? `[CQ:at,qq=${userId}]` : ""),
    room: () => (target.chatType === "group" ? "[CQ:at,qq=all]" : "")
  };
}

/** Sends messages through the NapCat (OneBot 11) HTTP API. */
export class NapCatHttpSender implements Deliverer {
  private readonly httpUrl: string;
  private readonly httpToken?: string;
  private readonly commandPrefix: string;

  constructor(
    config: Pick<AppConfig, "NAPCAT_HTTP_URL" | "NAPCAT_HTTP_TOKEN" | "COMMAND_PREFIX">,
    private readonly fetchFn: typeof fetch = fetch
  ) {
    this.httpUrl = config.NAPCAT_HTTP_URL.replace(/\/+$/, "");
    this.httpToken = config.NAPCAT_HTTP_TOKEN;
    this.commandPrefix = config.COMMAND_PREFIX;
  }

  async send(msg: SendMessage): Promise<void> {
    if (msg.target.chatType === "private") {
      await this.callApi("send_private_msg", { user_id: msg.target.userId, message: msg.text });
    } else {
      await this.callApi("send_group_msg", { group_id: msg.target.groupId, message: msg.text });
    }
    printOutbound(msg.target, msg.text);
  }

  async deliver(n: Notification): Promise<void> {
    const target = parseRoomId(n.roomId);
    const text = formatNotification(n, cqMentions(target), { commandPrefix: this.commandPrefix });
    await this.send({ target, text });
  }

  private async callApi(action: string, params: Record<string, unknown>): Promise<unknown> {
    const url = `${this.httpUrl}/${action}`;
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.httpToken) headers["Authorization"] = `Bearer ${this.httpToken}`;

    const res = await this.fetchFn(url, { method: "POST", headers, body: JSON.stringify(params) });
    const text = await res.text();
    if (!res.ok) throw new Error(`NapCat API ${action} failed: ${res.status} ${text}`);
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      return text;
    }
    // OneBot reports action failures with HTTP 200
    if (body && typeof body === "object" && Reflect.get(body, "status") === "failed") {
      throw new Error(`NapCat API ${action} failed: retcode ${String(Reflect.get(body, "retcode"))}`);
    }
    return body;
  }
}
