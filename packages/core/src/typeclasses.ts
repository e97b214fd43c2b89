/**
 * Eq, Ord, and Numeric capability dictionaries
 *
 * Operations that need equality, ordering, or addition take one of these
 * dictionaries instead of relying on what the `===`, `<` or `+` operators
 * happen to do for a given runtime value.
 *
 * Laws:
 *   - Reflexivity: eqv(x, x) === true
 *   - Symmetry: eqv(x, y) === eqv(y, x)
 *   - Transitivity: eqv(x, y) && eqv(y, z) => eqv(x, z)
 *   - Ord Totality: compare(x, y) <= 0 || compare(y, x) <= 0
 *   - Numeric identity: add(zero(), x) === x
 */

// ============================================================================
// Ordering
// ============================================================================

export type Ordering = -1 | 0 | 1;

export const LT: Ordering = -1;
export const EQ: Ordering = 0;
export const GT: Ordering = 1;

// ============================================================================
// Dictionaries
// ============================================================================

export interface Eq<A> {
  eqv(x: A, y: A): boolean;
}

export interface Ord<A> extends Eq<A> {
  compare(x: A, y: A): Ordering;
}

export interface Numeric<A> {
  zero(): A;
  add(a: A, b: A): A;
}

// ============================================================================
// Eq instances
// ============================================================================

/** `===` equality; `NaN` is never equal to itself. */
export const eqStrict: Eq<unknown> = {
  eqv: (x, y) => x === y,
};

/**
 * SameValueZero, the equality `Array.prototype.includes`, `Set` and `Map`
 * use: like `===` except that `NaN` equals `NaN`.
 */
export const eqSameValueZero: Eq<unknown> = {
  eqv: (x, y) => x === y || (Number.isNaN(x) && Number.isNaN(y)),
};

/** Default equality for values whose type has no dedicated instance. */
export function naturalEq<A>(): Eq<A> {
  return eqSameValueZero;
}

/** Equality on a derived key, e.g. `eqBy((u: User) => u.id, eqStrict)`. */
export function eqBy<A, B>(key: (a: A) => B, E: Eq<B>): Eq<A> {
  return { eqv: (x, y) => E.eqv(key(x), key(y)) };
}

// ============================================================================
// Ord instances
// ============================================================================

function compareWith<A extends number | bigint | string>(x: A, y: A): Ordering {
  return x < y ? LT : x > y ? GT : EQ;
}

export const ordNumber: Ord<number> = {
  eqv: (x, y) => x === y,
  compare: compareWith,
};

export const ordBigint: Ord<bigint> = {
  eqv: (x, y) => x === y,
  compare: compareWith,
};

/** Code-unit order, the same order as the `<` operator on strings. */
export const ordString: Ord<string> = {
  eqv: (x, y) => x === y,
  compare: compareWith,
};

export const ordDate: Ord<Date> = {
  eqv: (x, y) => x.getTime() === y.getTime(),
  compare: (x, y) => compareWith(x.getTime(), y.getTime()),
};

/**
 * Natural ordering of primitive values: numbers, bigints, strings and
 * Dates, each compared with its own kind.
 *
 * @throws TypeError when two values have no natural ordering between them
 */
function compareNatural(x: unknown, y: unknown): Ordering {
  if (typeof x === "number" && typeof y === "number") return ordNumber.compare(x, y);
  if (typeof x === "bigint" && typeof y === "bigint") return ordBigint.compare(x, y);
  if (typeof x === "string" && typeof y === "string") return ordString.compare(x, y);
  if (x instanceof Date && y instanceof Date) return ordDate.compare(x, y);
  throw new TypeError(
    `No natural ordering between ${describe(x)} and ${describe(y)}; pass an Ord instance`
  );
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") return value.constructor?.name ?? "object";
  return typeof value;
}

const ordNatural: Ord<unknown> = {
  eqv: (x, y) => compareNatural(x, y) === EQ,
  compare: compareNatural,
};

export function naturalOrd<A>(): Ord<A> {
  return ordNatural;
}

/** Ordering on a derived key, e.g. `ordBy((p: Person) => p.age, ordNumber)`. */
export function ordBy<A, B>(key: (a: A) => B, O: Ord<B>): Ord<A> {
  return {
    eqv: (x, y) => O.eqv(key(x), key(y)),
    compare: (x, y) => O.compare(key(x), key(y)),
  };
}

export function reverseOrd<A>(O: Ord<A>): Ord<A> {
  return {
    eqv: (x, y) => O.eqv(x, y),
    compare: (x, y) => O.compare(y, x),
  };
}

// ============================================================================
// Numeric instances
// ============================================================================

export const numericNumber: Numeric<number> = {
  zero: () => 0,
  add: (a, b) => a + b,
};

export const numericBigint: Numeric<bigint> = {
  zero: () => 0n,
  add: (a, b) => a + b,
};
