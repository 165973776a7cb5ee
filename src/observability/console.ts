import type { ChatEvent, SendMessage } from "../types.js";
import { errorMessage } from "../utils/async.js";

// Everything here goes to stderr; stdout carries the MCP stdio transport.

function formatTarget(target: SendMessage["target"]): string {
  if (target.chatType === "private") return `private u=${target.userId}`;
  return `group g=${target.groupId}`;
}

function brief(text: string, max = 160): string {
  const t = text.replace(/\s+/g, " ").trim();
  if (t.length <= max) return t;
  return `${t.slice(0, max)}…`;
}

export function printInbound(evt: ChatEvent, displayText: string): void {
  if (evt.chatType === "private") {
    console.error(`RX private u=${evt.userId} : ${brief(displayText)}`);
    return;
  }
  console.error(`RX group g=${evt.groupId} u=${evt.userId} : ${brief(displayText)}`);
}

export function printOutbound(target: SendMessage["target"], text: string): void {
  console.error(`TX ${formatTarget(target)} : ${brief(text)}`);
}

export function printError(context: string, err: unknown): void {
  console.error(`ERR ${context} : ${errorMessage(err)}`);
}
