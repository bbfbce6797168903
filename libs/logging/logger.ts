import pino from "pino";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "resilient-calls"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger for one engine component.
 */
export function getComponentLogger(component: string) {
  return logger.child({ component });
}

/**
 * Returns a child logger with the identity of a single logical call attached.
 */
export function getCallLogger(component: string, call: { id: number; name: string; attempt?: number }) {
  return logger.child({
    component,
    callId: call.id,
    call: call.name,
    attempt: call.attempt
  });
}
