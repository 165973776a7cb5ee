import type { MessageSegment } from "../types.js";

function isSegment(v: unknown): v is MessageSegment {
  if (!v || typeof v !== "object") return false;
  const type: unknown = Reflect.get(v, "type");
  const data: unknown = Reflect.get(v, "data");
  return typeof type === "string" && !!data && typeof data === "object";
}

export function normalizeSegments(message: unknown): MessageSegment[] {
  if (Array.isArray(message)) return message.filter(isSegment);
  if (typeof message === "string") return [{ type: "text", data: { text: message } }];
  return [{ type: "text", data: { text: String(message ?? "") } }];
}

export function segmentsToText(segments: MessageSegment[]): string {
  return segments
    .map((s) => {
      const value: unknown = s.type === "text" ? s.data.text : s.type === "at" ? s.data.qq : undefined;
      if (value === undefined || value === null) return "";
      return s.type === "at" ? `@${String(value)}` : String(value);
    })
    .join("")
    .trim();
}

export function stripSpecificAtMentions(text: string, ids: string[]): string {
  let out = String(text ?? "");
  for (const id of ids.map((x) => String(x).trim()).filter(Boolean)) {
    out = out.replaceAll(`@${id}`, "");
  }
  return out.replace(/[ \t]+/g, " ").trim();
}
