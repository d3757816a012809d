/**
 * Typed extraction of query parameters and path variables into the
 * request store.
 */

import type { TypeKey } from "~/context/type-map.ts";
import { ValidationError } from "~/errors/http.ts";
import type { BeforeFilter } from "~/filters/types.ts";
import { validate } from "~/schema/validator.ts";
import type { Schema } from "~/schema/types.ts";

/**
 * Query parameters as a plain object. Repeated names become arrays.
 */
export function queryToObject(
  query: URLSearchParams,
): Record<string, string | string[]> {
  const out: Record<string, string | string[]> = Object.create(null);
  for (const name of new Set(query.keys())) {
    const values = query.getAll(name);
    out[name] = values.length === 1 ? values[0] : values;
  }
  return out;
}

/**
 * Validate the query string and store the result under `key`. Invalid
 * input aborts the request with a 400 listing every issue.
 *
 * @example
 * ```typescript
 * const Page = Type.Object({ page: Type.Number({ minimum: 1 }) });
 * const PageKey = createKey<Static<typeof Page>>("page");
 *
 * app.get("/items", (ctx) => list(ctx.store.get(PageKey)), {
 *   before: [validateQuery(PageKey, Page)],
 * });
 * ```
 */
export function validateQuery<T>(
  key: TypeKey<T>,
  schema: Schema<T>,
): BeforeFilter {
  return async (ctx) => {
    const result = await validate(schema, queryToObject(ctx.query));
    if (!result.success) {
      return new ValidationError("Invalid query parameters", result.issues)
        .toReply();
    }
    ctx.store.set(key, result.data);
  };
}

/**
 * Validate the path variables and store the result under `key`.
 */
export function validateVariables<T>(
  key: TypeKey<T>,
  schema: Schema<T>,
): BeforeFilter {
  return async (ctx) => {
    const result = await validate(schema, ctx.variables.toObject());
    if (!result.success) {
      return new ValidationError("Invalid path variables", result.issues)
        .toReply();
    }
    ctx.store.set(key, result.data);
  };
}
