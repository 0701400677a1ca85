export * from "./symbols";

/**
 * Generic validation schema interface that can be implemented by any validation library.
 * Compatible with Zod, Yup, Joi, and other validation libraries.
 */
export interface IValidationSchema<T = unknown> {
  /**
   * Parse and validate the input data.
   * Should throw an error if validation fails.
   */
  parse(input: unknown): T;
}

/** Values produced for one object, keyed by field name. */
export type ResolvedValues = Record<string, unknown>;
