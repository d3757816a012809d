export { validate } from "~/schema/validator.ts";
export { isTypeBoxSchema, validateTypeBox } from "~/schema/typebox.ts";
export {
  type Infer,
  isStandardSchema,
  validateStandard,
} from "~/schema/standard.ts";
export { formatPath } from "~/schema/errors.ts";
export type { Schema, ValidationResult } from "~/schema/types.ts";
