import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { formatFailure, formatList } from "../../core/replies.js";
import { chatShape, roomOf, textResult, type ReminderToolDeps } from "./shared.js";

export function registerReminderListTool(server: McpServer, deps: ReminderToolDeps): void {
  server.registerTool(
    "reminder_list",
    {
      title: "List Reminders",
      description: "List the reminders of a chat, soonest first",
      inputSchema: chatShape
    },
    async (args) => {
      try {
        return textResult(formatList(await deps.service.list(roomOf(args))));
      } catch (e) {
        return textResult(formatFailure(e, "list"), true);
      }
    }
  );
}
