import pino from "pino";

// stderr only: stdout carries the status table and `config` output
export const logger = pino(
  {
    level: "info",
    base: { app: "lineup" },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2),
);

export type { Logger } from "pino";

export const moduleLogger = (module: string) => logger.child({ module });
