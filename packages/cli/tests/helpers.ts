/**
 * Shared fixtures: a colourless chalk and a logger that records its lines.
 */

import { Chalk } from "chalk";
import { DEFAULT_CALCULATION_CONTEXT } from "@annuitas/calc";
import { createLogger } from "../src/logger.js";
import type { CliDeps } from "../src/cli.js";

export interface LogRecord {
  readonly level: number;
  readonly msg: string;
  readonly [key: string]: unknown;
}

export interface TestDeps extends CliDeps {
  readonly logs: () => readonly LogRecord[];
}

function isLogRecord(value: unknown): value is LogRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number" &&
    "msg" in value &&
    typeof value.msg === "string"
  );
}

export function testDeps(overrides: Partial<CliDeps> = {}): TestDeps {
  const lines: string[] = [];
  const logger = createLogger(
    { LOG_LEVEL: "debug", NODE_ENV: "test" },
    { write: (msg: string) => { lines.push(msg); } },
  );

  return {
    context: DEFAULT_CALCULATION_CONTEXT,
    logger,
    chalk: new Chalk({ level: 0 }),
    defaults: { currency: "USD", decimals: 2 },
    ...overrides,
    logs: () =>
      lines.map((line): LogRecord => {
        const parsed: unknown = JSON.parse(line);
        if (!isLogRecord(parsed)) throw new Error(`Not a log record: ${line}`);
        return parsed;
      }),
  };
}
