/**
 * HTTP error classes.
 */

import { SwitchyardError } from "~/errors/base.ts";
import type { ErrorResponse, ValidationIssue } from "~/errors/types.ts";
import type { Reply } from "~/response/reply.ts";

/**
 * 400 Bad Request error.
 */
export class BadRequestError extends SwitchyardError {
  constructor(message = "Bad Request", details?: unknown) {
    super(message, 400, "BAD_REQUEST", details);
    this.name = "BadRequestError";
  }
}

/**
 * 400 Bad Request raised by a validation filter. The issues are always
 * part of the body since the client needs them to fix the request.
 */
export class ValidationError extends SwitchyardError {
  readonly issues: ValidationIssue[];

  constructor(message = "Validation failed", issues: ValidationIssue[] = []) {
    super(message, 400, "VALIDATION_ERROR", issues);
    this.name = "ValidationError";
    this.issues = issues;
  }

  override toJSON(development = false): ErrorResponse {
    const response = super.toJSON(development);
    response.error.details = this.issues;
    return response;
  }
}

/**
 * 404 Not Found error. Produced when no pattern matches the path.
 */
export class NotFoundError extends SwitchyardError {
  constructor(message = "Not Found", details?: unknown) {
    super(message, 404, "NOT_FOUND", details);
    this.name = "NotFoundError";
  }
}

/**
 * 405 Method Not Allowed error. The reply carries an `Allow` header
 * listing the methods the matched endpoint supports.
 */
export class MethodNotAllowedError extends SwitchyardError {
  readonly allowed: readonly string[];

  constructor(allowed: readonly string[], message = "Method Not Allowed") {
    super(message, 405, "METHOD_NOT_ALLOWED", { allowed });
    this.name = "MethodNotAllowedError";
    this.allowed = allowed;
  }

  override toReply(development = false): Reply {
    const reply = super.toReply(development);
    reply.headers.set("Allow", this.allowed.join(", "));
    return reply;
  }
}

/**
 * 406 Not Acceptable error. No registered content type satisfies the
 * request's Accept header and the endpoint has no fallback handler.
 */
export class NotAcceptableError extends SwitchyardError {
  readonly available: readonly string[];

  constructor(available: readonly string[], message = "Not Acceptable") {
    super(message, 406, "NOT_ACCEPTABLE", { available });
    this.name = "NotAcceptableError";
    this.available = available;
  }
}

/**
 * 500 error wrapping a failure thrown by a filter or handler. The cause
 * is kept for logging and never sent to the client outside development.
 */
export class HandlerFailureError extends SwitchyardError {
  constructor(message = "Internal Server Error", cause?: unknown) {
    super(message, 500, "HANDLER_FAILURE", describeCause(cause), false);
    this.name = "HandlerFailureError";
    this.cause = cause;
  }
}

function describeCause(cause: unknown): unknown {
  if (cause === undefined) return undefined;
  if (cause instanceof Error) {
    return {
      originalName: cause.name,
      originalMessage: cause.message,
      originalStack: cause.stack,
    };
  }
  return { value: String(cause) };
}
