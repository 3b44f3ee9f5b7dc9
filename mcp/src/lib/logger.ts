/**
 * Pino logger factory.
 *
 * Always writes JSON to stderr (fd 2): stdout carries the report in CLI mode
 * and the protocol stream in MCP mode. Silenced under Vitest / NODE_ENV=test.
 */

import pino, { type Logger } from "pino";

export type { Logger } from "pino";

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isTestTooling = process.env.VITEST === "true" || process.env.NODE_ENV === "test";

  return pino(
    {
      level: process.env.PINO_LOG_LEVEL ?? "info",
      enabled: !isTestTooling,
      base: { ...bindings, app: "chief-tally" },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: 2, sync: true }),
  );
}

/** For tests: keeps the Logger type, emits nothing. */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

export const logger = makeLogger();
