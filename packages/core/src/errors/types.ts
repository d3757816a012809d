/**
 * Shapes shared by error replies and validation filters.
 */

import type { SwitchyardError } from "./base.ts";

/**
 * One rejected field of a query or path variable set.
 */
export interface ValidationIssue {
  /** Dotted path such as `page` or `filter.tags.0`, `(root)` for the whole value. */
  field: string;
  message: string;
  /** Validator-specific kind, when the schema library reports one. */
  code?: string;
}

/**
 * Body of every error reply the core produces.
 */
export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    status: number;
    details?: unknown;
    stack?: string[];
  };
}

/**
 * Maps anything thrown during dispatch to a request-time error. Replaces
 * `defaultErrorTransformer` when given to the application.
 */
export type ErrorTransformer = (error: unknown) => SwitchyardError;
