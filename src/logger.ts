/**
 * Root pino logger and per-component children.
 */
import { pino, type Logger } from "pino";

export type { Logger };

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: { service: "blog-medallion" },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function childLogger(component: string): Logger {
  return logger.child({ component });
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
