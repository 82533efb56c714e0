import "dotenv/config";
import pino from "pino";

export const logger = pino({
  name: "drift-event-indexer",
  level: process.env.LOG_LEVEL || "info",
});

export function createChildLogger(component: string) {
  return logger.child({ component });
}
