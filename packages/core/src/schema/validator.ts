import { isTypeBoxSchema, validateTypeBox } from "~/schema/typebox.ts";
import { validateStandard } from "~/schema/standard.ts";
import type { Schema, ValidationResult } from "~/schema/types.ts";

/**
 * Validate with whichever schema flavour was given.
 */
export function validate<T>(
  schema: Schema<T>,
  data: unknown,
): Promise<ValidationResult<T>> {
  if (isTypeBoxSchema(schema)) {
    return Promise.resolve(validateTypeBox(schema, data));
  }
  return validateStandard(schema, data);
}
