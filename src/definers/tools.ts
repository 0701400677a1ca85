/**
 * Type guard and utility functions for checking field descriptors.
 */
import type {
  ComputedValue,
  DelegatedValue,
  FieldDescriptor,
  IgnoredMarker,
  PostResolvedValue,
  RequiredMarker,
} from "../types/field";
import type { FactoryIdentity, IFactory } from "../types/factory";
import {
  symbolComputed,
  symbolDelegated,
  symbolFactory,
  symbolIgnored,
  symbolPostResolved,
  symbolRequired,
} from "../types/symbols";

function hasBrand(value: unknown, brand: symbol): boolean {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    brand in value
  );
}

/**
 * Type guard: checks if a field is the required marker.
 * @param value - Any field value to test.
 */
export function isRequired(value: unknown): value is RequiredMarker {
  return hasBrand(value, symbolRequired);
}

export function isIgnored(value: unknown): value is IgnoredMarker {
  return hasBrand(value, symbolIgnored);
}

/**
 * Type guard: checks if a field wraps a callable resolved in the first pass.
 */
export function isComputed(value: unknown): value is ComputedValue {
  return hasBrand(value, symbolComputed);
}

/**
 * Type guard: checks if a field is resolved after all other fields.
 */
export function isPostResolved(value: unknown): value is PostResolvedValue {
  return hasBrand(value, symbolPostResolved);
}

/**
 * Type guard: checks if a field is built by another registered factory.
 */
export function isDelegated(value: unknown): value is DelegatedValue {
  return hasBrand(value, symbolDelegated);
}

export function isFieldDescriptor(value: unknown): value is FieldDescriptor {
  return (
    isRequired(value) ||
    isIgnored(value) ||
    isComputed(value) ||
    isPostResolved(value) ||
    isDelegated(value)
  );
}

export function isFactory(value: unknown): value is IFactory<unknown> {
  return hasBrand(value, symbolFactory);
}

/** Normalizes a factory identity to its registry key. */
export function identityOf(identity: FactoryIdentity): string {
  return typeof identity === "string" ? identity : identity.id;
}
