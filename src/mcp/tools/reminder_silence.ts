import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { formatFailure, formatSilence } from "../../core/replies.js";
import { chatShape, roomOf, textResult, type ReminderToolDeps } from "./shared.js";

export function registerReminderSilenceTool(server: McpServer, deps: ReminderToolDeps): void {
  server.registerTool(
    "reminder_silence",
    {
      title: "Silence Alarm",
      description: "Silence an alarm that is going off. Without a query, silences the only ringing alarm of the chat",
      inputSchema: {
        ...chatShape,
        query: z.string().optional()
      }
    },
    async (args) => {
      try {
        const result = await deps.service.silence(roomOf(args), args.query ?? "");
        return textResult(formatSilence(result), result.status !== "silenced");
      } catch (e) {
        return textResult(formatFailure(e, "silence"), true);
      }
    }
  );
}
