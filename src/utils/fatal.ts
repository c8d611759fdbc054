/**
 * Fatal exit
 * One critical line, then exit code 1. No cleanup runs.
 */

import type { Logger } from "./logger";

export function exitOnFatal(error: unknown, logger: Logger): never {
  const message = error instanceof Error ? error.message : String(error);
  logger.critical(message);
  process.exit(1);
}
