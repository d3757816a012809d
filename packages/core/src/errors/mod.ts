/**
 * Errors module - structured error handling.
 */

export { SwitchyardError } from "~/errors/base.ts";
export {
  BuildError,
  ConfigError,
  ConflictingPatternError,
  RouterFrozenError,
} from "~/errors/build.ts";
export {
  BadRequestError,
  HandlerFailureError,
  MethodNotAllowedError,
  NotAcceptableError,
  NotFoundError,
  ValidationError,
} from "~/errors/http.ts";
export {
  defaultErrorTransformer,
  errorToReply,
  isOperationalError,
  isSwitchyardError,
} from "~/errors/transformer.ts";
export type {
  ErrorResponse,
  ErrorTransformer,
  ValidationIssue,
} from "~/errors/types.ts";
