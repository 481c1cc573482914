import pino from "pino";
import type { SequenceConfig } from "../execution/types.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "escalation-sequencer"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger with the sequence identity attached.
 */
export function getSequenceLogger(sequenceId: string, config: Pick<SequenceConfig, "asset" | "direction">) {
  return logger.child({
    sequenceId,
    asset: config.asset,
    direction: config.direction
  });
}

export type SequenceLogger = ReturnType<typeof getSequenceLogger>;
