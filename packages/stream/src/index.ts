/**
 * @seqflow/stream — lazy, composable sequence pipelines
 *
 * Chains like `.filter().map().take()` describe a pipeline without reading
 * anything; terminal operations (`collect`, `run`, `count`, `sum`, ...) run
 * it, fusing per-element steps into a single pass over the source.
 *
 * @example
 * ```typescript
 * import { of, range } from "@seqflow/stream";
 *
 * range(1, 5)
 *   .map((x) => x * 2)
 *   .map((x) => x * x)
 *   .collect(); // [4, 16, 36, 64, 100]
 *
 * of([1, 2, 1, 3, 4, 5, 1, 6, 7]).uniq().collect(); // [1, 2, 3, 4, 5, 6, 7]
 *
 * range(1, 5).chunkEvery(2).collect(); // [[1, 2], [3, 4], [5]]
 * ```
 */

export { LazySequence } from "./sequence.js";
export { of, range } from "./sequence-entry.js";

export {
  SequenceError,
  EmptySequenceError,
  InvalidArgumentError,
} from "./errors.js";
export type { SequenceErrorReason } from "./errors.js";

export type { PipelineStep, Stage, Source, Pair, SplitOptions } from "./types.js";
