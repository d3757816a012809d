import type { StandardSchemaV1 } from "@standard-schema/spec";
import { formatPath } from "~/schema/errors.ts";
import type { ValidationResult } from "~/schema/types.ts";

/**
 * Infer the output type from any Standard Schema compliant schema.
 *
 * @example
 * ```typescript
 * import { z } from "zod";
 * const schema = z.object({ name: z.string() });
 * type User = Infer<typeof schema>; // { name: string }
 * ```
 */
export type Infer<S> = S extends StandardSchemaV1<unknown, infer TOutput>
  ? TOutput
  : never;

/**
 * Check if a value implements the Standard Schema interface.
 */
export function isStandardSchema(value: unknown): value is StandardSchemaV1 {
  if (
    (typeof value !== "object" && typeof value !== "function") ||
    value === null || !("~standard" in value)
  ) {
    return false;
  }
  const props = value["~standard"];
  return typeof props === "object" && props !== null &&
    "validate" in props && typeof props.validate === "function";
}

/**
 * Validate data against a Standard Schema.
 *
 * @example
 * ```typescript
 * import { z } from "zod";
 *
 * const result = await validateStandard(z.object({ name: z.string() }), {
 *   name: "Ada",
 * });
 * if (result.success) result.data.name; // "Ada"
 * ```
 */
export async function validateStandard<T>(
  schema: StandardSchemaV1<unknown, T>,
  data: unknown,
): Promise<ValidationResult<T>> {
  const result = await schema["~standard"].validate(data);

  if (result.issues) {
    return {
      success: false,
      issues: result.issues.map((issue) => ({
        field: formatPath(issue.path),
        message: issue.message,
      })),
    };
  }

  return { success: true, data: result.value };
}
