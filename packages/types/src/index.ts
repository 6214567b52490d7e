/**
 * @annuitas/types — Shared domain types for the annuitas packages.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Financial types
export type {
  Money,
  Currency,
  RoundingMode,
} from "./financial.js";

export { ROUNDING_MODES } from "./financial.js";

// Runtime type guards
export {
  isMoney,
  isRoundingMode,
} from "./guards.js";
