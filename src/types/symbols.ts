/**
 * Internal brand symbols used to tag created objects at runtime and help with
 * type‑narrowing. Prefer the `isComputed`/`isPostResolved`/`isDelegated`
 * helpers instead of touching these directly.
 * @internal
 */
export const symbolRequired: unique symbol = Symbol.for("fieldkit.required");
export const symbolIgnored: unique symbol = Symbol.for("fieldkit.ignored");
export const symbolComputed: unique symbol = Symbol.for("fieldkit.computed");
/** Marks a field resolved in the second pass, after every other field. */
export const symbolPostResolved: unique symbol = Symbol.for(
  "fieldkit.postResolved",
);
export const symbolDelegated: unique symbol = Symbol.for("fieldkit.delegated");
export const symbolFactory: unique symbol = Symbol.for("fieldkit.factory");
/** @internal Marks error helpers produced by defineError() */
export const symbolError: unique symbol = Symbol.for("fieldkit.error");
