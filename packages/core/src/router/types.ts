import type { Endpoint } from "~/endpoint/endpoint.ts";
import type { Variables } from "~/router/variables.ts";

export type HttpMethod =
  | "GET"
  | "HEAD"
  | "POST"
  | "PUT"
  | "PATCH"
  | "DELETE"
  | "OPTIONS"
  | "CONNECT"
  | "TRACE";

/**
 * A method token. Extension methods are opaque strings compared exactly.
 */
export type Method = HttpMethod | (string & Record<never, never>);

export type TrailingSlash = "normalize" | "strict";

export interface RouterOptions {
  /** Compare static segments case-sensitively. Default: true */
  caseSensitive: boolean;
  /**
   * `normalize` treats `/a/` as `/a`; `strict` keeps the trailing slash
   * significant. Default: `normalize`
   */
  trailingSlash: TrailingSlash;
  /** Accept `*name` segments in patterns. Default: true */
  allowWildcards: boolean;
}

export const DEFAULT_ROUTER_OPTIONS: Readonly<RouterOptions> = Object.freeze({
  caseSensitive: true,
  trailingSlash: "normalize",
  allowWildcards: true,
});

export type Segment =
  | { readonly kind: "static"; readonly text: string }
  | { readonly kind: "variable"; readonly name: string }
  | { readonly kind: "wildcard"; readonly name: string };

export type MatchResult<H> =
  | {
    readonly kind: "matched";
    readonly endpoint: Endpoint<H>;
    /** The pattern as registered. */
    readonly pattern: string;
    /** Method the endpoint serves the request with (`GET` for a bare `HEAD`). */
    readonly method: string;
    readonly variables: Variables;
  }
  | { readonly kind: "no-match" }
  | { readonly kind: "method-not-allowed"; readonly allowed: string[] };

/**
 * Route definition accepted by `Router.build`.
 */
export interface RouteDefinition<H> {
  pattern: string;
  method: Method;
  handler: H;
  contentType?: string;
}
