/**
 * Lazy sequence pipeline
 *
 * Chained per-element operations (.map, .filter, .take, .join, ...) are
 * recorded as steps and run fused, in a single pass over the source, when a
 * terminal operation is called. Operations that group, index or
 * de-duplicate wrap the current sequence as the source of a new one.
 * Nothing is read from the source until a terminal operation runs.
 */

import {
  config,
  createLogger,
  GT,
  LT,
  naturalEq,
  naturalOrd,
  numericNumber,
  unreachable,
} from "@seqflow/core";
import type { Eq, Numeric, Ord, Ordering } from "@seqflow/core";
import { EmptySequenceError, requirePositiveInteger } from "./errors.js";
import { rangeIterable, runStage } from "./stages.js";
import type { Pair, PipelineStep, Source, SplitOptions, Stage } from "./types.js";

const log = createLogger("stream");

/** One iterator being drained; its values enter the steps at index `from`. */
interface Frame {
  readonly iterator: Iterator<unknown>;
  readonly from: number;
}

/**
 * A lazy, composable view over a sequence of values.
 *
 * Every chain method returns a new `LazySequence` and leaves the receiver
 * untouched, so one pipeline can be branched or evaluated any number of
 * times. A sequence built with `of()` reads its source by reference: the
 * source must not be mutated or discarded before the terminal operations
 * that read it have run.
 *
 * @example
 * ```typescript
 * range(1, 10)
 *   .filter((x) => x % 2 === 0)
 *   .map((x) => x * 10)
 *   .take(2)
 *   .collect(); // [20, 40]; elements after 4 are never produced
 * ```
 */
export class LazySequence<T> implements Iterable<T> {
  private readonly source: Source;
  private readonly steps: readonly PipelineStep[];

  constructor(source: Source, steps?: readonly PipelineStep[]) {
    this.source = source;
    this.steps = steps ?? [];
  }

  private chain<U>(step: PipelineStep): LazySequence<U> {
    return new LazySequence<U>(this.source, [...this.steps, step]);
  }

  private nest<U>(stage: Stage): LazySequence<U> {
    return new LazySequence<U>({ kind: "stage", upstream: this, stage });
  }

  [Symbol.iterator](): Iterator<T> {
    return this.execute();
  }

  // ---------------------------------------------------------------------------
  // Per-element operations
  // ---------------------------------------------------------------------------

  /** Transform each element */
  map<U>(f: (value: T) => U): LazySequence<U> {
    return this.chain<U>({ type: "map", f });
  }

  /** Call `f` on each element as it passes through; elements are unchanged */
  each(f: (value: T) => void): LazySequence<T> {
    return this.chain<T>({ type: "each", f });
  }

  /** Keep only elements that satisfy the predicate */
  filter<S extends T>(predicate: (value: T) => value is S): LazySequence<S>;
  filter(predicate: (value: T) => boolean): LazySequence<T>;
  filter(predicate: (value: T) => boolean): LazySequence<T> {
    return this.chain<T>({ type: "filter", predicate });
  }

  /** Drop elements that satisfy the predicate */
  reject(predicate: (value: T) => boolean): LazySequence<T> {
    return this.filter((value) => !predicate(value));
  }

  /**
   * Take the first `count` elements. Traversal stops as soon as the last of
   * them has been produced.
   *
   * @throws InvalidArgumentError unless `count` is a positive integer
   */
  take(count: number): LazySequence<T> {
    requirePositiveInteger("take", "count", count);
    return this.chain<T>({ type: "take", count });
  }

  /** Flatten a sequence of iterables by one level */
  join<U>(this: LazySequence<Iterable<U>>): LazySequence<U> {
    return this.chain<U>({ type: "join" });
  }

  /** First component of each pair */
  keys<K>(this: LazySequence<Pair<K, unknown>>): LazySequence<K> {
    return this.map((pair) => pair[0]);
  }

  /** Second component of each pair */
  values<V>(this: LazySequence<Pair<unknown, V>>): LazySequence<V> {
    return this.map((pair) => pair[1]);
  }

  // ---------------------------------------------------------------------------
  // Nesting operations
  // ---------------------------------------------------------------------------

  /**
   * Split into the runs of elements between occurrences of `token`. The
   * token itself is not part of any group.
   *
   * String-split semantics, except that an empty sequence produces no groups
   * (where `"".split(",")` gives `[""]`). Adjacent tokens and tokens at either
   * end produce empty groups unless `empty: "drop"` is given.
   */
  splitBy(token: T, options: SplitOptions<T> = {}): LazySequence<T[]> {
    const empty = options.empty ?? config.getChoice("split.empty", ["keep", "drop"], "keep");
    return this.nest<T[]>({
      type: "splitBy",
      token,
      eq: options.eq ?? naturalEq<T>(),
      keepEmpty: empty === "keep",
    });
  }

  /**
   * Split into consecutive arrays of `size` elements; the last one holds
   * whatever is left.
   *
   * @throws InvalidArgumentError unless `size` is a positive integer
   */
  chunkEvery(size: number): LazySequence<T[]> {
    requirePositiveInteger("chunkEvery", "size", size);
    return this.nest<T[]>({ type: "chunkEvery", size });
  }

  /**
   * Pair each element with its zero-based position. For an array or typed
   * array passed straight to `of()`, elements are read by index.
   */
  withIndex(): LazySequence<[number, T]> {
    return this.nest<[number, T]>({ type: "withIndex" });
  }

  /**
   * Keep the first occurrence of each value.
   *
   * Without `eq`, the `uniq.strategy` config decides: "compare" checks each
   * element against the distinct values before it with SameValueZero,
   * "hash" uses a `Set`. An explicit `eq` always compares.
   */
  uniq(eq?: Eq<T>): LazySequence<T> {
    const strategy = config.getChoice("uniq.strategy", ["compare", "hash"], "compare");
    if (eq !== undefined && strategy === "hash") {
      log.warn("uniq(): an explicit Eq cannot be hashed; comparing instead");
    }
    return this.nest<T>({
      type: "uniq",
      strategy: eq === undefined ? strategy : "compare",
      eq: eq ?? naturalEq<T>(),
    });
  }

  /**
   * Fold the sequence now and wrap the result as a one-element sequence.
   * Without `initial`, the first element seeds the fold.
   *
   * @throws EmptySequenceError when there is no `initial` and no element
   */
  reduce<A>(initial: A, f: (acc: A, value: T) => A): LazySequence<A>;
  reduce(f: (acc: T, value: T) => T): LazySequence<T>;
  reduce<A>(
    ...args: [initial: A, f: (acc: A, value: T) => A] | [f: (acc: T, value: T) => T]
  ): LazySequence<A> | LazySequence<T> {
    if (args.length === 2) {
      const [initial, f] = args;
      const result = this.fold(initial, f);
      log.debug("reduce: folded with initial value");
      return new LazySequence<A>({ kind: "owned", items: [result] });
    }

    const [f] = args;
    const iterator = this.execute();
    try {
      const head = iterator.next();
      if (head.done) throw new EmptySequenceError("reduce");
      let acc = head.value;
      for (let next = iterator.next(); !next.done; next = iterator.next()) {
        acc = f(acc, next.value);
      }
      log.debug("reduce: folded from first element");
      return new LazySequence<T>({ kind: "owned", items: [acc] });
    } finally {
      iterator.return(undefined);
    }
  }

  // ---------------------------------------------------------------------------
  // Terminal operations
  // ---------------------------------------------------------------------------

  /** Collect all elements into an array */
  collect(): T[] {
    const result: T[] = [];
    for (const value of this.execute()) {
      result.push(value);
    }
    log.debug(() => `collect: ${result.length} elements`);
    return result;
  }

  /** Traverse for the side effects of `each` and discard the elements */
  run(): void {
    let n = 0;
    for (const _value of this.execute()) {
      n++;
    }
    log.debug(() => `run: ${n} elements`);
  }

  /** Left fold, returning the accumulated value */
  fold<A>(initial: A, f: (acc: A, value: T) => A): A {
    let acc = initial;
    for (const value of this.execute()) {
      acc = f(acc, value);
    }
    return acc;
  }

  /**
   * Number of elements, or of elements equal to `value`. A range or array
   * with no operations applied reports its size without traversal.
   */
  count(): number;
  count(value: T, eq?: Eq<T>): number;
  count(...args: [] | [value: T, eq?: Eq<T>]): number {
    let n = 0;
    if (args.length === 0) {
      const size = this.sized();
      if (size !== undefined) return size;
      for (const _value of this.execute()) {
        n++;
      }
      return n;
    }

    const [target, eq = naturalEq<T>()] = args;
    for (const value of this.execute()) {
      if (eq.eqv(value, target)) n++;
    }
    return n;
  }

  /** True if some element equals `value` */
  contains(value: T, eq: Eq<T> = naturalEq<T>()): boolean {
    for (const element of this.execute()) {
      if (eq.eqv(element, value)) return true;
    }
    return false;
  }

  /**
   * Smallest element; the first one wins a tie.
   *
   * @throws EmptySequenceError on an empty sequence
   * @throws TypeError when elements have no natural ordering and no `ord` is given
   */
  min(ord: Ord<T> = naturalOrd<T>()): T {
    return this.extreme("min", ord, LT);
  }

  /**
   * Largest element; the first one wins a tie.
   *
   * @throws EmptySequenceError on an empty sequence
   * @throws TypeError when elements have no natural ordering and no `ord` is given
   */
  max(ord: Ord<T> = naturalOrd<T>()): T {
    return this.extreme("max", ord, GT);
  }

  /** Sum of numeric elements, 0 when empty */
  sum(this: LazySequence<number>): number {
    return this.sumWith(numericNumber);
  }

  /** Sum using a Numeric instance, starting from `numeric.zero()` */
  sumWith(numeric: Numeric<T>): T {
    return this.fold(numeric.zero(), (acc, value) => numeric.add(acc, value));
  }

  /** True if every element satisfies the predicate (true when empty) */
  all(predicate: (value: T) => boolean): boolean {
    for (const value of this.execute()) {
      if (!predicate(value)) return false;
    }
    return true;
  }

  /** True if at least one element satisfies the predicate */
  any(predicate: (value: T) => boolean): boolean {
    for (const value of this.execute()) {
      if (predicate(value)) return true;
    }
    return false;
  }

  /** First element, or undefined if empty */
  first(): T | undefined {
    for (const value of this.execute()) {
      return value;
    }
    return undefined;
  }

  // ---------------------------------------------------------------------------
  // Execution engine
  // ---------------------------------------------------------------------------

  private extreme(operation: "min" | "max", ord: Ord<T>, wins: Ordering): T {
    const iterator = this.execute();
    try {
      const head = iterator.next();
      if (head.done) throw new EmptySequenceError(operation);
      let best = head.value;
      for (let next = iterator.next(); !next.done; next = iterator.next()) {
        if (ord.compare(next.value, best) === wins) best = next.value;
      }
      return best;
    } finally {
      iterator.return(undefined);
    }
  }

  /** Size known without traversal: an untouched range, array or owned result. */
  private sized(): number | undefined {
    if (this.steps.length > 0) return undefined;
    const source = this.source;
    if (source.kind === "range") return Math.max(0, source.end - source.begin + 1);
    return this.indexed()?.length;
  }

  /** Positional view of an untouched array-backed source. */
  private indexed(): ArrayLike<unknown> | undefined {
    if (this.steps.length > 0) return undefined;
    const source = this.source;
    if (source.kind === "owned") return source.items;
    if (source.kind === "borrowed" && isRandomAccess(source.items)) return source.items;
    return undefined;
  }

  private produce(): Iterable<unknown> {
    const source = this.source;
    switch (source.kind) {
      case "borrowed":
      case "owned":
        return source.items;
      case "range":
        return rangeIterable(source.begin, source.end);
      case "stage":
        return runStage(source.stage, source.upstream, source.upstream.indexed());
      default:
        return unreachable(source);
    }
  }

  /**
   * Core execution generator. Pulls one element at a time from the source
   * and pushes it through every step before pulling the next. `join` pushes
   * the element's own iterator on a stack so its children run the remaining
   * steps first. Per-run state (take counters, the stack) lives here, so
   * every terminal operation starts from scratch.
   */
  private *execute(): Generator<T> {
    const steps = this.steps;
    const remaining = steps.map((step) => (step.type === "take" ? step.count : 0));
    const stack: Frame[] = [{ iterator: this.produce()[Symbol.iterator](), from: 0 }];

    try {
      while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        // Checked before every pull, so rejected elements and finished
        // children cannot lead to a read past an exhausted take
        if (takeSatisfied(steps, remaining, frame.from)) return;
        const next = frame.iterator.next();
        if (next.done) {
          stack.pop();
          continue;
        }

        let value: unknown = next.value;
        let emit = true;
        for (let i = frame.from; emit && i < steps.length; i++) {
          const step = steps[i];
          switch (step.type) {
            case "map":
              value = step.f(value);
              break;
            case "each":
              step.f(value);
              break;
            case "filter":
              emit = step.predicate(value);
              break;
            case "take":
              // Everything still queued would reach this take too
              if (remaining[i] === 0) return;
              remaining[i]--;
              break;
            case "join":
              stack.push({ iterator: iteratorOf(value), from: i + 1 });
              emit = false;
              break;
            default:
              unreachable(step);
          }
        }

        if (emit) yield value as T;
      }
    } finally {
      for (let i = stack.length - 1; i >= 0; i--) {
        stack[i].iterator.return?.();
      }
    }
  }
}

/**
 * True once a take that every queued element must still pass through has
 * nothing left to give, so the source need not be pulled again.
 */
function takeSatisfied(steps: readonly PipelineStep[], remaining: number[], from: number): boolean {
  for (let i = from; i < steps.length; i++) {
    if (steps[i].type === "take" && remaining[i] === 0) return true;
  }
  return false;
}

function isRandomAccess(items: Iterable<unknown>): items is Iterable<unknown> & ArrayLike<unknown> {
  return Array.isArray(items) || (ArrayBuffer.isView(items) && !(items instanceof DataView));
}

function isIterable(value: unknown): value is Iterable<unknown> {
  if (typeof value === "string") return true;
  if (typeof value !== "object" || value === null || !(Symbol.iterator in value)) return false;
  return typeof value[Symbol.iterator] === "function";
}

function iteratorOf(value: unknown): Iterator<unknown> {
  if (!isIterable(value)) {
    throw new TypeError(`join(): expected every element to be iterable, got ${String(value)}`);
  }
  return value[Symbol.iterator]();
}
