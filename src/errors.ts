import { error } from "./definers/builders/error";
import type { DefaultErrorType, IFieldkitError } from "./types/error";

// Delegated target missing from the registry
export const factoryNotRegisteredError = error<
  { id: string } & DefaultErrorType
>("fieldkit.errors.factoryNotRegistered")
  .format(
    ({ id }) =>
      `Factory "${id}" has not been registered. A factory must be registered before fields can delegate to it.`,
  )
  .remediation(
    ({ id }) =>
      `Call registry.register(factory) for "${id}" or define it with { register: true }.`,
  )
  .build();

// Required field not supplied at build time
export const missingRequiredFieldError = error<
  { factoryId: string; field: string } & DefaultErrorType
>("fieldkit.errors.missingRequiredField")
  .format(
    ({ factoryId, field }) =>
      `Field "${field}" of factory "${factoryId}" is required and must be passed as a build override.`,
  )
  .build();

// Duplicate registration
export const duplicateRegistrationError = error<
  { id: string } & DefaultErrorType
>("fieldkit.errors.duplicateRegistration")
  .format(({ id }) => `Factory "${id}" is already registered.`)
  .remediation(
    "Use a unique id per factory, or unregister the previous one first.",
  )
  .build();

// Locked
export const lockedError = error<{ what: string } & DefaultErrorType>(
  "fieldkit.errors.locked",
)
  .format(({ what }) => `Cannot modify the ${what} when it is locked.`)
  .build();

// Validation error
export const validationError = error<
  {
    subject: string;
    id: string;
    originalError: string | Error;
  } & DefaultErrorType
>("fieldkit.errors.validation")
  .format(({ subject, id, originalError }) => {
    const errorMessage =
      originalError instanceof Error
        ? originalError.message
        : String(originalError);
    return `${subject} validation failed for ${id}: ${errorMessage}`;
  })
  .build();

/**
 * Errors signalling a bad build parameter: an unregistered delegation target
 * or a required field the caller left out.
 */
export function isParameterError(err: unknown): err is IFieldkitError {
  return factoryNotRegisteredError.is(err) || missingRequiredFieldError.is(err);
}
