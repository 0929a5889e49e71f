import pino, { type Logger } from "pino";

export type { Logger };

export const createLogger = (level = process.env.LOG_LEVEL || "info") =>
  pino({
    name: "cord19-explorer",
    level,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });

export const logger = createLogger();
