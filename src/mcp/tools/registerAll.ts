import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerReminderCancelTool } from "./reminder_cancel.js";
import { registerReminderCreateTool } from "./reminder_create.js";
import { registerReminderListTool } from "./reminder_list.js";
import { registerReminderSilenceTool } from "./reminder_silence.js";
import type { ReminderToolDeps } from "./shared.js";

export function registerAllTools(server: McpServer, deps: ReminderToolDeps): void {
  registerReminderCreateTool(server, deps);
  registerReminderListTool(server, deps);
  registerReminderCancelTool(server, deps);
  registerReminderSilenceTool(server, deps);
}
