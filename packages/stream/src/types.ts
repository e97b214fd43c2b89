/**
 * Pipeline IR types for @seqflow/stream
 *
 * A LazySequence is a source plus a list of per-element steps. Steps run
 * fused, one element at a time, in a single pass over the source. Stages
 * that need to see more than one element at once (grouping, indexing,
 * de-duplication) become the source of a new sequence instead, nesting
 * the upstream sequence inside.
 */

import type { Eq, SplitEmptyMode, UniqStrategy } from "@seqflow/core";
import type { LazySequence } from "./sequence.js";

/** A per-element step in a fused pipeline */
export type PipelineStep =
  | { readonly type: "map"; f(value: unknown): unknown }
  | { readonly type: "each"; f(value: unknown): void }
  | { readonly type: "filter"; predicate(value: unknown): boolean }
  | { readonly type: "take"; readonly count: number }
  | { readonly type: "join" };

/** A stage that consumes a whole upstream sequence */
export type Stage =
  | {
      readonly type: "splitBy";
      readonly token: unknown;
      readonly eq: Eq<unknown>;
      readonly keepEmpty: boolean;
    }
  | { readonly type: "chunkEvery"; readonly size: number }
  | { readonly type: "withIndex" }
  | { readonly type: "uniq"; readonly strategy: UniqStrategy; readonly eq: Eq<unknown> };

/**
 * Where a sequence's elements come from. `borrowed` sources are read by
 * reference and must stay alive and unmodified until every terminal
 * operation on the pipeline has run; all other kinds own their data.
 */
export type Source =
  | { readonly kind: "borrowed"; readonly items: Iterable<unknown> }
  | { readonly kind: "range"; readonly begin: number; readonly end: number }
  | { readonly kind: "owned"; readonly items: readonly unknown[] }
  | { readonly kind: "stage"; readonly upstream: LazySequence<unknown>; readonly stage: Stage };

/** A `[key, value]` pair as produced by `Map#entries()` or `Object.entries()` */
export type Pair<K, V> = readonly [K, V];

export interface SplitOptions<T> {
  /** Token equality. Defaults to SameValueZero. */
  readonly eq?: Eq<T>;
  /** Defaults to the `split.empty` config value ("keep"). */
  readonly empty?: SplitEmptyMode;
}
