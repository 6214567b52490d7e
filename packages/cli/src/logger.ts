/**
 * @annuitas/cli — Logging.
 *
 * Structured pino logs on stderr, so they never mix with the results
 * printed on stdout. Development runs are pretty-printed.
 */

import { destination as pinoDestination, pino } from "pino";
import type { DestinationStream, Logger, LoggerOptions } from "pino";
import type { AppConfig } from "./config.js";

export type { Logger } from "pino";

export function createLogger(
  config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">,
  destination?: DestinationStream,
): Logger {
  const options: LoggerOptions = { name: "annuitas", level: config.LOG_LEVEL };

  if (destination !== undefined) {
    return pino(options, destination);
  }

  if (config.NODE_ENV === "development") {
    return pino({
      ...options,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }

  return pino(options, pinoDestination(2));
}
