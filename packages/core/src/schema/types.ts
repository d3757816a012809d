import type { StandardSchemaV1 } from "@standard-schema/spec";
import type { TSchema } from "@sinclair/typebox";
import type { ValidationIssue } from "~/errors/types.ts";

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; issues: ValidationIssue[] };

/**
 * A schema producing `T`: a TypeBox schema, or anything implementing
 * Standard Schema (Zod, Valibot, ArkType).
 */
export type Schema<T> =
  | (TSchema & { static: T })
  | StandardSchemaV1<unknown, T>;
