/**
 * Per-request context.
 *
 * Carries the request, the variables bound by the router, a type-indexed
 * store for data passed between filters and handlers, and helpers that
 * build replies.
 */

import { silentLogger } from "~/logging/logger.ts";
import type { Logger } from "~/logging/types.ts";
import { Reply } from "~/response/reply.ts";
import { EMPTY_VARIABLES, type Variables } from "~/router/variables.ts";
import { type ReadonlyTypeMap, TypeMap } from "~/context/type-map.ts";

/** How the request ended, as seen by after-filters. */
export type Outcome = "pending" | "completed" | "aborted" | "failed";

export interface ContextInit {
  request: Request;
  /** Decoded request path; defaults to the URL's pathname. */
  path?: string;
  variables?: Variables;
  global?: ReadonlyTypeMap;
  log?: Logger;
  signal?: AbortSignal;
  /** Checked by streaming replies between chunks. */
  stillWanted?: () => boolean;
  /** Media type chosen by content negotiation. */
  contentType?: string;
}

const EMPTY_GLOBAL: ReadonlyTypeMap = new TypeMap().freeze();

/**
 * Request context passed to filters and handlers.
 *
 * @example
 * ```typescript
 * app.get("/users/:id", (ctx) => {
 *   const id = ctx.variables.get("id");
 *   const auth = ctx.headers.get("Authorization");
 *   return ctx.json({ userId: id });
 * });
 * ```
 */
export class Context {
  readonly request: Request;
  readonly variables: Variables;
  readonly global: ReadonlyTypeMap;
  readonly log: Logger;
  readonly signal: AbortSignal | undefined;
  readonly contentType: string | undefined;
  readonly startedAt: number = performance.now();

  /**
   * Typed data for this request only.
   *
   * @example
   * ```typescript
   * const UserKey = createKey<User>("user");
   *
   * // In a before-filter
   * ctx.store.set(UserKey, await loadUser(ctx));
   *
   * // In the handler
   * const user = ctx.store.get(UserKey);
   * ```
   */
  readonly store = new TypeMap();

  outcome: Outcome = "pending";

  private readonly wanted: () => boolean;
  private readonly pathname: string | undefined;
  private _url: URL | null = null;
  private _params: Record<string, string> | null = null;

  constructor(init: ContextInit) {
    this.request = init.request;
    this.pathname = init.path;
    this.variables = init.variables ?? EMPTY_VARIABLES;
    this.global = init.global ?? EMPTY_GLOBAL;
    this.log = init.log ?? silentLogger();
    this.signal = init.signal;
    this.contentType = init.contentType;
    this.wanted = init.stillWanted ?? (() => true);
  }

  get url(): URL {
    if (!this._url) {
      this._url = new URL(this.request.url);
    }
    return this._url;
  }

  get method(): string {
    return this.request.method;
  }

  get headers(): Headers {
    return this.request.headers;
  }

  get path(): string {
    return this.pathname ?? this.url.pathname;
  }

  /**
   * URL query parameters.
   *
   * @example
   * ```typescript
   * // For URL "/search?q=rails&limit=10"
   * ctx.query.get("q"); // "rails"
   * ```
   */
  get query(): URLSearchParams {
    return this.url.searchParams;
  }

  /**
   * Plain-object view of the variables.
   *
   * @example
   * For route "/users/:id", requesting "/users/123" gives `{ id: "123" }`
   */
  get params(): Record<string, string> {
    if (!this._params) {
      this._params = this.variables.toObject();
    }
    return this._params;
  }

  /**
   * Whether the client still wants the response. Turns false once the
   * request is cancelled.
   */
  stillWanted(): boolean {
    return !this.signal?.aborted && this.wanted();
  }

  bodyJson(): Promise<unknown> {
    return this.request.json();
  }

  bodyText(): Promise<string> {
    return this.request.text();
  }

  async bodyBytes(): Promise<Uint8Array> {
    return new Uint8Array(await this.request.arrayBuffer());
  }

  json(data: unknown, status?: number): Reply {
    return Reply.json(data, status);
  }

  text(text: string, status?: number): Reply {
    return Reply.text(text, status);
  }

  html(html: string, status?: number): Reply {
    return Reply.html(html, status);
  }

  /**
   * Binary reply.
   *
   * @param contentType - Defaults to `application/octet-stream`
   */
  bytes(
    data: Uint8Array | ArrayBuffer,
    contentType?: string,
    status?: number,
  ): Reply {
    return Reply.bytes(data, contentType, status);
  }

  /**
   * Streaming reply. The producer is called once, when the body is written,
   * and is not pulled any further once the client has gone.
   */
  stream(
    source: () => AsyncIterable<Uint8Array>,
    contentType?: string,
    status?: number,
  ): Reply {
    return Reply.stream(source, contentType, status);
  }

  redirect(location: string, status = 302): Reply {
    return Reply.redirect(location, status);
  }

  noContent(): Reply {
    return Reply.empty(204);
  }

  /**
   * JSON error reply in the same shape thrown errors are rendered with.
   */
  error(status: number, message: string, code = "ERROR"): Reply {
    return Reply.json({ error: { message, code, status } }, status);
  }
}
