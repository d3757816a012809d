export { Endpoint } from "~/endpoint/endpoint.ts";
export type { Resolution } from "~/endpoint/endpoint.ts";
export {
  negotiate,
  normalizeMediaType,
  parseAccept,
} from "~/endpoint/accept.ts";
export type { MediaRange } from "~/endpoint/accept.ts";
export { invokeHandler, isHandler } from "~/endpoint/handler.ts";
export type { Handler, HandlerFn, HandlerObject } from "~/endpoint/handler.ts";
