// Re-export all define functions from their separate files
export { defineFactory } from "./definers/defineFactory";
export { defineError } from "./definers/defineError";
export {
  required,
  ignored,
  use,
  postGenerated,
  delegate,
} from "./definers/fields";

// Re-export type guards and utility functions
export {
  isRequired,
  isIgnored,
  isComputed,
  isPostResolved,
  isDelegated,
  isFieldDescriptor,
  isFactory,
  identityOf,
} from "./definers/tools";
