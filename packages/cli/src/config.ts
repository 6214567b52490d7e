/**
 * @annuitas/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isRoundingMode } from "@annuitas/types";
import type { RoundingMode } from "@annuitas/types";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("warn"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Numeric context
  CALC_PRECISION: z.coerce.number().int().min(1).max(1000).default(16),
  CALC_ROUNDING: z
    .custom<RoundingMode>((value) => isRoundingMode(value), {
      message: "Must be one of UP, DOWN, CEILING, FLOOR, HALF_UP, HALF_DOWN, HALF_EVEN, HALF_CEILING, HALF_FLOOR",
    })
    .default("HALF_EVEN"),

  // Amount defaults
  DEFAULT_CURRENCY: z.string().trim().min(1).default("USD"),
  DEFAULT_DECIMALS: z.coerce.number().int().min(0).max(18).default(2),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * One line per issue, e.g. `CALC_PRECISION: Number must be greater than or equal to 1`.
 */
export function formatConfigErrors(error: z.ZodError): readonly string[] {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
}
