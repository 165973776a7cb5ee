import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { formatCancelled, formatFailure } from "../../core/replies.js";
import { chatShape, roomOf, textResult, type ReminderToolDeps } from "./shared.js";

export function registerReminderCancelTool(server: McpServer, deps: ReminderToolDeps): void {
  server.registerTool(
    "reminder_cancel",
    {
      title: "Cancel Reminder",
      description: "Cancel a reminder of a chat by its text, its id or an id prefix of at least 4 characters",
      inputSchema: {
        ...chatShape,
        query: z.string().min(1)
      }
    },
    async (args) => {
      try {
        await deps.service.cancel(roomOf(args), args.query);
        return textResult(formatCancelled());
      } catch (e) {
        return textResult(formatFailure(e, "cancel"), true);
      }
    }
  );
}
