import { pino } from "pino";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

export const logger = pino({
  level: resolveLevel(),
  base: {
    system: "coldchain"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger bound to one ledger operation and its caller.
 */
export function getOperationLogger(operation: string, caller: string) {
  return logger.child({
    operation,
    caller
  });
}
