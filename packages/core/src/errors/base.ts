/**
 * Request-time errors. Build-time failures live in `build.ts` and are
 * thrown to the caller instead of being rendered.
 */

import { Reply } from "~/response/reply.ts";
import type { ErrorResponse } from "./types.ts";

/**
 * An error raised while a request is being dispatched. The filter chain
 * turns it into a JSON reply with its `status`; operational errors are
 * answered quietly, the others are logged with their cause.
 *
 * @example
 * ```typescript
 * app.get("/teapot", () => {
 *   throw new SwitchyardError("Short and stout", 418, "TEAPOT");
 * });
 * ```
 */
export class SwitchyardError extends Error {
  readonly status: number;
  /** Stable code clients can branch on, e.g. `NOT_FOUND`. */
  readonly code: string;
  /** Sent only when `development` is on. */
  readonly details?: unknown;
  /** False for failures of the application itself; those get logged. */
  readonly isOperational: boolean;

  constructor(
    message: string,
    status = 500,
    code = "INTERNAL_ERROR",
    details?: unknown,
    isOperational = true,
  ) {
    super(message);
    this.name = "SwitchyardError";
    this.status = status;
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Body of the error reply. `development` adds details and the stack.
   */
  toJSON(development = false): ErrorResponse {
    const response: ErrorResponse = {
      error: {
        message: this.message,
        code: this.code,
        status: this.status,
      },
    };

    if (development) {
      if (this.details !== undefined) {
        response.error.details = this.details;
      }
      if (this.stack) {
        response.error.stack = this.stack.split("\n").map((l) => l.trim());
      }
    }

    return response;
  }

  /**
   * JSON reply carrying this error's status.
   */
  toReply(development = false): Reply {
    return Reply.json(this.toJSON(development), this.status);
  }
}
