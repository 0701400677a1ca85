import { z } from "zod";
import type { IValidationSchema } from "../types/utilities";
import { validationError } from "../errors";

/** Batch sizes: whole numbers above zero. */
export const batchSizeSchema = z.number().int().positive();

/**
 * Parses `value` with a Zod‑like schema, rethrowing any failure as a
 * `fieldkit.errors.validation` error that names the subject and id.
 */
export function parseWithSchema<T>(
  schema: IValidationSchema<T>,
  value: unknown,
  subject: string,
  id: string,
): T {
  try {
    return schema.parse(value);
  } catch (error) {
    return validationError.throw({
      subject,
      id,
      originalError: error instanceof Error ? error : new Error(String(error)),
    });
  }
}
