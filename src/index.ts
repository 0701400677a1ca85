import { defineFactory } from "./define";
import { error as errorFn } from "./definers/builders/error";

export { defineFactory as factory };
export {
  required,
  ignored,
  use,
  postGenerated,
  delegate,
  defineError,
  isRequired,
  isIgnored,
  isComputed,
  isPostResolved,
  isDelegated,
  isFieldDescriptor,
  isFactory,
} from "./define";
export { FieldkitError } from "./definers/defineError";
export { error } from "./definers/builders/error";

export * as Errors from "./errors";
export { isParameterError } from "./errors";

export {
  DEFAULT_CONFIG,
  loadConfig,
  createLogger,
  getDefaultLogger,
  setDefaultLogger,
} from "./config";
export type { FieldkitConfig } from "./config";

// Single namespace holding the builder entry points
export const f = Object.freeze({
  factory: defineFactory,
  error: errorFn,
});

export * from "./defs";
export * from "./models";
