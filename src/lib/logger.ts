/**
 * Application logger.
 *
 * Vite resolves pino to its browser build, which writes through console.
 * Level comes from VITE_LOG_LEVEL; tests run silent.
 */

import pino, { type Logger } from "pino";

/** The subset of the logger the engine stores depend on. */
export type EngineLogger = Pick<Logger, "debug" | "info" | "warn">;

function resolveLevel(): string {
  if (import.meta.env.MODE === "test") return "silent";
  return import.meta.env.VITE_LOG_LEVEL ?? "info";
}

export const logger: Logger = pino({
  level: resolveLevel(),
  base: { app: "data-explorer" },
  browser: { asObject: true },
});

/** Child logger bound to a module name. */
export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
