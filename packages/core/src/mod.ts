/**
 * Switchyard core: routing, negotiation, filters and response assembly.
 */

import { Type } from "@sinclair/typebox";

/**
 * TypeBox schema builder, for validation filters and configuration.
 *
 * @example
 * ```typescript
 * import { createKey, t, validateQuery, type Static } from "@switchyard/core";
 *
 * const Paging = t.Object({ page: t.Number({ minimum: 1 }) });
 * const PagingKey = createKey<Static<typeof Paging>>("paging");
 * ```
 */
export const t = Type;
export type { Static, TSchema } from "@sinclair/typebox";

export * from "~/app/mod.ts";
export * from "~/config/mod.ts";
export * from "~/context/mod.ts";
export * from "~/endpoint/mod.ts";
export * from "~/errors/mod.ts";
export * from "~/filters/mod.ts";
export * from "~/logging/mod.ts";
export * from "~/response/mod.ts";
export * from "~/router/mod.ts";
export * from "~/schema/mod.ts";
