/**
 * Generators behind the owned `range` source and the nesting stages.
 *
 * Each one pulls from its upstream only as far as its consumer asks, so a
 * stage placed before `take` stops as soon as `take` does.
 */

import { unreachable } from "@seqflow/core";
import type { Eq, UniqStrategy } from "@seqflow/core";
import type { Stage } from "./types.js";

/** Inclusive integer progression; empty when `end < begin`. */
export function* rangeIterable(begin: number, end: number): Generator<number> {
  for (let i = begin; i <= end; i++) yield i;
}

/**
 * @param indexed - positional view of the upstream when it has one, used by
 *   `withIndex` to read each element by index instead of counting
 */
export function runStage(
  stage: Stage,
  upstream: Iterable<unknown>,
  indexed: ArrayLike<unknown> | undefined
): Iterable<unknown> {
  switch (stage.type) {
    case "splitBy":
      return splitBy(upstream, stage.token, stage.eq, stage.keepEmpty);
    case "chunkEvery":
      return chunkEvery(upstream, stage.size);
    case "withIndex":
      return indexed === undefined ? withCounter(upstream) : withPosition(indexed);
    case "uniq":
      return uniq(upstream, stage.strategy, stage.eq);
    default:
      return unreachable(stage);
  }
}

function* splitBy(
  upstream: Iterable<unknown>,
  token: unknown,
  eq: Eq<unknown>,
  keepEmpty: boolean
): Generator<unknown[]> {
  let group: unknown[] = [];
  let sawAny = false;

  for (const value of upstream) {
    sawAny = true;
    if (!eq.eqv(value, token)) {
      group.push(value);
      continue;
    }
    if (keepEmpty || group.length > 0) yield group;
    group = [];
  }

  // A trailing token leaves an empty final group, as "a,".split(",") does
  if (sawAny && (keepEmpty || group.length > 0)) yield group;
}

function* chunkEvery(upstream: Iterable<unknown>, size: number): Generator<unknown[]> {
  let chunk: unknown[] = [];
  for (const value of upstream) {
    chunk.push(value);
    if (chunk.length === size) {
      yield chunk;
      chunk = [];
    }
  }
  if (chunk.length > 0) yield chunk;
}

function* withPosition(indexed: ArrayLike<unknown>): Generator<[number, unknown]> {
  const length = indexed.length;
  for (let i = 0; i < length; i++) {
    yield [i, indexed[i]];
  }
}

function* withCounter(upstream: Iterable<unknown>): Generator<[number, unknown]> {
  let index = 0;
  for (const value of upstream) {
    yield [index++, value];
  }
}

function* uniq(upstream: Iterable<unknown>, strategy: UniqStrategy, eq: Eq<unknown>): Generator<unknown> {
  if (strategy === "hash") {
    const seen = new Set<unknown>();
    for (const value of upstream) {
      if (seen.has(value)) continue;
      seen.add(value);
      yield value;
    }
    return;
  }

  // Kept iff nothing before it is equal; only distinct values need checking
  const seen: unknown[] = [];
  for (const value of upstream) {
    if (seen.some((earlier) => eq.eqv(earlier, value))) continue;
    seen.push(value);
    yield value;
  }
}
