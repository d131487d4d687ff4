import pino, { type Logger } from "pino";

export type { Logger };

export const logger: Logger = pino({
  name: "tubescout",
  level: process.env.LOG_LEVEL || "info",
});

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
