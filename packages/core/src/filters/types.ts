/**
 * Filter type definitions.
 */

import type { Context } from "~/context/context.ts";
import type { SwitchyardError } from "~/errors/base.ts";
import type { Reply } from "~/response/reply.ts";

/** Returning a `Reply` aborts (before) or replaces (after). */
export type FilterResult = Reply | undefined | void;

/**
 * Runs before the handler with the in-flight reply. Headers it sets on the
 * reply are kept on whatever reply the request ends with.
 *
 * @example
 * ```typescript
 * const auth: BeforeFilter = (ctx) => {
 *   if (!ctx.headers.get("Authorization")) {
 *     return ctx.error(401, "Unauthorized");
 *   }
 * };
 * ```
 */
export type BeforeFilter = (
  ctx: Context,
  reply: Reply,
) => FilterResult | Promise<FilterResult>;

/**
 * Runs after the handler, or after an abort or failure, exactly once per
 * request.
 */
export type AfterFilter = (
  ctx: Context,
  reply: Reply,
) => FilterResult | Promise<FilterResult>;

/**
 * A before/after pair registered together.
 */
export interface Filter {
  name?: string;
  before?: BeforeFilter;
  after?: AfterFilter;
}

/**
 * Application hook for request-time errors. Returning nothing falls back to
 * the error's own reply.
 */
export type ErrorHook = (
  error: SwitchyardError,
  ctx: Context,
) => FilterResult | Promise<FilterResult>;
