export { Router } from "~/router/tree.ts";
export { formatPattern, parsePattern, splitPath } from "~/router/segments.ts";
export { EMPTY_VARIABLES, Variables } from "~/router/variables.ts";
export { DEFAULT_ROUTER_OPTIONS } from "~/router/types.ts";
export type {
  HttpMethod,
  MatchResult,
  Method,
  RouteDefinition,
  RouterOptions,
  Segment,
  TrailingSlash,
} from "~/router/types.ts";
