/**
 * Error transformation utilities.
 */

import { SwitchyardError } from "~/errors/base.ts";
import { BadRequestError, HandlerFailureError } from "~/errors/http.ts";
import type { ErrorTransformer } from "~/errors/types.ts";
import type { Reply } from "~/response/reply.ts";

/**
 * Default error transformer.
 * Converts any thrown value to a SwitchyardError.
 */
export function defaultErrorTransformer(error: unknown): SwitchyardError {
  if (error instanceof SwitchyardError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === "SyntaxError" && error.message.includes("JSON")) {
      return new BadRequestError("Invalid JSON in request body", {
        originalMessage: error.message,
      });
    }
  }

  return new HandlerFailureError("Internal Server Error", error);
}

/**
 * Create an error reply from any error.
 */
export function errorToReply(
  error: unknown,
  development = false,
  transformer: ErrorTransformer = defaultErrorTransformer,
): Reply {
  return transformer(error).toReply(development);
}

/**
 * Type guard to check if a value is a SwitchyardError.
 */
export function isSwitchyardError(error: unknown): error is SwitchyardError {
  return error instanceof SwitchyardError;
}

/**
 * Type guard to check if an error is operational (expected).
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof SwitchyardError) {
    return error.isOperational;
  }
  return false;
}
