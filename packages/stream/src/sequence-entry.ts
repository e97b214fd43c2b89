/**
 * Entry points for creating lazy sequences.
 *
 * `of()` borrows any iterable; `range()` owns an inclusive integer range.
 */

import { requireInteger } from "./errors.js";
import { LazySequence } from "./sequence.js";

/**
 * Wrap an iterable without copying it. Arrays, strings, Sets, Maps (as
 * `[key, value]` pairs), typed arrays and other sequences all work.
 *
 * The iterable is read by reference each time a terminal operation runs:
 * mutating it in between changes what later traversals see, and what a
 * mutation during traversal does is up to the iterable.
 */
export function of<T>(items: Iterable<T>): LazySequence<T> {
  return new LazySequence<T>({ kind: "borrowed", items });
}

/**
 * The integers from `begin` to `end`, both included. Empty when
 * `end < begin`.
 *
 * @throws InvalidArgumentError if either bound is not a safe integer
 */
export function range(begin: number, end: number): LazySequence<number> {
  requireInteger("range", "begin", begin);
  requireInteger("range", "end", end);
  return new LazySequence<number>({ kind: "range", begin, end });
}
