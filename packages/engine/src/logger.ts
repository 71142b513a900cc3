import { pino } from "pino";
import type { Logger } from "pino";

export type { Logger };

/**
 * Engine-wide logger. The level comes from `WORDVM_LOG_LEVEL` (default
 * "info"); per-instruction output is logged at "trace".
 */
export const logger: Logger = pino({
  name: "wordvm-engine",
  level: process.env["WORDVM_LOG_LEVEL"] ?? "info",
});
