import { FormatRegistry, Kind, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { ValidationResult } from "~/schema/types.ts";

if (!FormatRegistry.Has("email")) {
  FormatRegistry.Set("email", (v) => /^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(v));
}
if (!FormatRegistry.Has("uuid")) {
  FormatRegistry.Set(
    "uuid",
    (v) =>
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i.test(v),
  );
}
if (!FormatRegistry.Has("uri")) {
  FormatRegistry.Set("uri", (v) => URL.canParse(v));
}
if (!FormatRegistry.Has("date-time")) {
  FormatRegistry.Set("date-time", (v) => !isNaN(Date.parse(v)));
}
if (!FormatRegistry.Has("date")) {
  FormatRegistry.Set("date", (v) => /^\d{4}-\d{2}-\d{2}$/.test(v));
}

export function isTypeBoxSchema(value: unknown): value is TSchema {
  return typeof value === "object" && value !== null && Kind in value;
}

/**
 * Validate against a TypeBox schema. Text input from query strings and
 * path variables is converted first, so `"10"` passes `Type.Number()`.
 */
export function validateTypeBox<T>(
  schema: TSchema & { static: T },
  data: unknown,
): ValidationResult<T> {
  const converted = Value.Convert(schema, Value.Clone(data));

  if (Value.Check(schema, converted)) {
    return { success: true, data: converted };
  }

  return {
    success: false,
    issues: [...Value.Errors(schema, converted)].map((err) => ({
      field: err.path.replace(/^\//, "").replace(/\//g, ".") || "(root)",
      message: err.message,
      code: String(err.type),
    })),
  };
}
