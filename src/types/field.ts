import {
  symbolComputed,
  symbolDelegated,
  symbolIgnored,
  symbolPostResolved,
  symbolRequired,
} from "./symbols";
import type { ResolvedValues } from "./utilities";
import type { FactoryIdentity, IFactoryLookup } from "./factory";

/**
 * Field descriptors are a closed set of tagged variants. The build pipeline
 * switches on `kind`; the brand symbols back the `is*` guards.
 *
 * - `required`: the caller must supply the value at build time
 * - `ignored`: never generated, never part of the result
 * - `computed`: callable + fixed args, resolved in the first pass
 * - `postResolved`: callable resolved in the second pass, seeing the other fields
 * - `delegated`: resolved by another registered factory
 */
export interface RequiredMarker {
  readonly kind: "required";
  readonly [symbolRequired]: true;
}

export interface IgnoredMarker {
  readonly kind: "ignored";
  readonly [symbolIgnored]: true;
}

export interface ComputedValue<TResult = unknown> {
  readonly kind: "computed";
  readonly [symbolComputed]: true;
  /** The wrapped callable. Typed opaquely; call it through `resolve()`. */
  readonly fn: (...args: never) => TResult;
  /** Arguments passed to `fn`, in call order. */
  readonly args: readonly unknown[];
  /** Invokes `fn(...args)`. Not memoized. */
  resolve(): TResult;
}

/**
 * Callable signature for post-resolved fields: the field name, the values
 * already produced for the same object, then the fixed args.
 */
export type PostResolver<TArgs extends unknown[], TResult> = (
  name: string,
  values: Readonly<ResolvedValues>,
  ...args: TArgs
) => TResult;

export interface PostResolvedValue<TResult = unknown> {
  readonly kind: "postResolved";
  readonly [symbolPostResolved]: true;
  readonly fn: (...args: never) => TResult;
  readonly args: readonly unknown[];
  /**
   * Invokes `fn(name, values, ...args)`. Must only be called once every
   * first-pass field of the owning object has been resolved.
   */
  resolve(name: string, values: Readonly<ResolvedValues>): TResult;
}

export interface DelegateOptions {
  /** When set, the target's `batch(size, overrides)` is used instead of `build`. */
  size?: number;
  /** Build overrides forwarded to the target factory. */
  overrides?: ResolvedValues;
}

export interface DelegatedValue {
  readonly kind: "delegated";
  readonly [symbolDelegated]: true;
  /** Identity looked up at resolve time, never a live instance. */
  readonly target: FactoryIdentity;
  readonly size?: number;
  readonly overrides: Readonly<ResolvedValues>;
  /**
   * Looks the target up and builds through it.
   * @param registry - Defaults to the global factory registry.
   */
  resolve(registry?: IFactoryLookup): unknown;
}

export type FieldDescriptor =
  | RequiredMarker
  | IgnoredMarker
  | ComputedValue
  | PostResolvedValue
  | DelegatedValue;

/**
 * What a factory declares per attribute: a descriptor, or any other value
 * which is copied into the result as-is.
 */
export type FieldMap = Readonly<Record<string, unknown>>;
