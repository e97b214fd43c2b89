/**
 * @seqflow/core — shared runtime for seqflow packages
 *
 * - Unified configuration (defaults, config files, SEQFLOW_* env, config.set)
 * - Scoped debug logger
 * - Eq / Ord / Numeric capability dictionaries and their standard instances
 * - `unreachable` for exhaustive switches
 */

export { config, defineConfig } from "./config.js";
export type { SeqflowConfig, UniqStrategy, SplitEmptyMode } from "./config.js";

export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";

export {
  LT,
  EQ,
  GT,
  eqStrict,
  eqSameValueZero,
  naturalEq,
  eqBy,
  ordNumber,
  ordBigint,
  ordString,
  ordDate,
  naturalOrd,
  ordBy,
  reverseOrd,
  numericNumber,
  numericBigint,
} from "./typeclasses.js";
export type { Ordering, Eq, Ord, Numeric } from "./typeclasses.js";

export { unreachable } from "./safety.js";
