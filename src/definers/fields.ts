import type {
  ComputedValue,
  DelegatedValue,
  DelegateOptions,
  IgnoredMarker,
  PostResolvedValue,
  PostResolver,
  RequiredMarker,
} from "../types/field";
import type { FactoryIdentity, IFactoryLookup } from "../types/factory";
import {
  symbolComputed,
  symbolDelegated,
  symbolIgnored,
  symbolPostResolved,
  symbolRequired,
} from "../types/symbols";
import { factoryNotRegisteredError } from "../errors";
import { globalFactoryRegistry } from "../models/FactoryRegistry";
import { batchSizeSchema, parseWithSchema } from "../tools/validation";
import { identityOf } from "./tools";

/**
 * Marks a field the caller must supply as a build override.
 */
export function required(): RequiredMarker {
  return Object.freeze({ kind: "required", [symbolRequired]: true } as const);
}

/**
 * Marks a field excluded from generation. It never reaches the built object.
 */
export function ignored(): IgnoredMarker {
  return Object.freeze({ kind: "ignored", [symbolIgnored]: true } as const);
}

/**
 * Wraps a callable invoked with the given args whenever the field is built.
 * Named arguments go in a trailing options object, as the callable declares.
 *
 * @example
 * ```ts
 * const fields = { total: use((a: number, b: number) => a + b, 2, 3) };
 * ```
 */
export function use<TArgs extends unknown[], TResult>(
  fn: (...args: TArgs) => TResult,
  ...args: TArgs
): ComputedValue<TResult> {
  return Object.freeze({
    kind: "computed",
    [symbolComputed]: true,
    fn,
    args: Object.freeze([...args]),
    resolve: () => fn(...args),
  } as const);
}

/**
 * Defers a field to the second pass: `fn` receives the field name and the
 * values already resolved for the same object, followed by `args`.
 */
export function postGenerated<TArgs extends unknown[], TResult>(
  fn: PostResolver<TArgs, TResult>,
  ...args: TArgs
): PostResolvedValue<TResult> {
  return Object.freeze({
    kind: "postResolved",
    [symbolPostResolved]: true,
    fn,
    args: Object.freeze([...args]),
    resolve: (name: string, values: Readonly<Record<string, unknown>>) =>
      fn(name, values, ...args),
  } as const);
}

/**
 * Builds the field through another factory, found by identity in a registry
 * at resolve time. With `size` the target's batch is used.
 */
export function delegate(
  target: FactoryIdentity,
  options: DelegateOptions = {},
): DelegatedValue {
  const id = identityOf(target);
  const size =
    options.size === undefined
      ? undefined
      : parseWithSchema(batchSizeSchema, options.size, "Delegated size", id);
  const overrides = Object.freeze({ ...options.overrides });

  return Object.freeze({
    kind: "delegated",
    [symbolDelegated]: true,
    target,
    size,
    overrides,
    resolve(registry: IFactoryLookup = globalFactoryRegistry): unknown {
      const factory = registry.lookup(target);
      if (!factory) {
        return factoryNotRegisteredError.throw({ id });
      }
      if (size !== undefined) {
        return factory.batch(size, { ...overrides });
      }
      return factory.build({ ...overrides });
    },
  } as const);
}
