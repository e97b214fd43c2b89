/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking.
 * At runtime, throws if somehow reached.
 *
 * @example
 * ```typescript
 * type Shape = { kind: "circle" } | { kind: "square" };
 * function area(shape: Shape): number {
 *   switch (shape.kind) {
 *     case "circle": return Math.PI;
 *     case "square": return 1;
 *     default: return unreachable(shape); // Type error if Shape is extended
 *   }
 * }
 * ```
 */
export function unreachable(value: never): never {
  throw new Error(`Unreachable code reached with ${JSON.stringify(value)}`);
}
