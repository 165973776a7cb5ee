import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { NapCatHttpSender } from "../adapters/napcatqq/NapCatHttpSender.js";
import { createReminderApp, startReminderApp } from "../app.js";
import { loadConfig } from "../config.js";
import { logger } from "../logger.js";
import { registerAllTools } from "./tools/registerAll.js";

// Runs the scheduler itself; do not point it at the same DATA_DIR as a running bot.
const config = loadConfig();
const app = createReminderApp(config, new NapCatHttpSender(config));

const server = new McpServer({ name: "reminders", version: "0.1.0" });
registerAllTools(server, { service: app.service, clock: app.clock });

await startReminderApp(app);

const transport = new StdioServerTransport();
await server.connect(transport);
logger.info({ timezone: config.TIMEZONE }, "Reminder MCP server ready");
