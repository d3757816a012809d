export { cors, type CorsOptions } from "~/filters/builtin/cors.ts";
export {
  requestLogger,
  type RequestLoggerOptions,
} from "~/filters/builtin/logger.ts";
export {
  queryToObject,
  validateQuery,
  validateVariables,
} from "~/filters/builtin/validate.ts";
