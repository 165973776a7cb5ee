import pino, { type Logger } from "pino";

export type { Logger };

export const logger: Logger = pino(
  {
    name: "reminder-bot",
    level: process.env.LOG_LEVEL?.trim() || "info"
  },
  pino.destination(2)
);

export const silentLogger: Logger = pino({ level: "silent" });
