import { negotiate, normalizeMediaType } from "~/endpoint/accept.ts";
import { RouterFrozenError } from "~/errors/build.ts";

const METHOD_TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

interface MethodVariants<H> {
  /** Handlers per negotiated content type, in registration order. */
  typed: Map<string, { handler: H }>;
  /** Handler used when no content type was asked for or none matches. */
  fallback: { handler: H } | null;
}

export type Resolution<H> =
  | { readonly kind: "handler"; readonly handler: H; readonly contentType?: string }
  | { readonly kind: "not-acceptable"; readonly available: string[] }
  | { readonly kind: "method-not-allowed"; readonly allowed: string[] };

/**
 * The method and content-type → handler mapping attached to the tree node
 * where a pattern ends.
 *
 * @example
 * ```typescript
 * const endpoint = new Endpoint<string>("/report");
 * endpoint.register("GET", "html", "text/html");
 * endpoint.register("GET", "json", "application/json");
 * endpoint.resolve("GET", "application/json"); // { kind: "handler", handler: "json", ... }
 * ```
 */
export class Endpoint<H> {
  readonly pattern: string;
  private readonly variants = new Map<string, MethodVariants<H>>();
  private isFrozen = false;

  constructor(pattern: string) {
    this.pattern = pattern;
  }

  /**
   * Supported methods in first-registration order.
   */
  get methods(): string[] {
    return [...this.variants.keys()];
  }

  get frozen(): boolean {
    return this.isFrozen;
  }

  /**
   * Stop accepting handlers. Called by the owning router's `freeze()`.
   */
  freeze(): this {
    this.isFrozen = true;
    return this;
  }

  /**
   * Register a handler. Without `contentType` it becomes the method's
   * fallback. Registering the same `(method, contentType)` pair again
   * replaces the previous handler.
   *
   * @throws {RouterFrozenError} After `freeze()`.
   */
  register(method: string, handler: H, contentType?: string): void {
    if (this.isFrozen) {
      throw new RouterFrozenError(`${method} ${this.pattern}`);
    }
    if (!METHOD_TOKEN.test(method)) {
      throw new TypeError(`Invalid method token: "${method}"`);
    }

    let variants = this.variants.get(method);
    if (!variants) {
      variants = { typed: new Map(), fallback: null };
      this.variants.set(method, variants);
    }

    if (contentType === undefined) {
      variants.fallback = { handler };
      return;
    }

    const mediaType = normalizeMediaType(contentType);
    if (!mediaType || mediaType.includes("*")) {
      throw new TypeError(`Invalid content type: "${contentType}"`);
    }
    variants.typed.set(mediaType, { handler });
  }

  /**
   * The method this endpoint answers `method` with. `HEAD` falls back to
   * `GET` when no `HEAD` handler is registered.
   */
  serves(method: string): string | undefined {
    if (this.variants.has(method)) return method;
    if (method === "HEAD" && this.variants.has("GET")) return "GET";
    return undefined;
  }

  /**
   * Content types registered for a method, in registration order.
   */
  contentTypes(method: string): string[] {
    const variants = this.variants.get(method);
    return variants ? [...variants.typed.keys()] : [];
  }

  /**
   * Pick the handler for a method and an Accept header value.
   */
  resolve(method: string, accept?: string | null): Resolution<H> {
    const served = this.serves(method);
    const variants = served === undefined
      ? undefined
      : this.variants.get(served);
    if (!variants) {
      return { kind: "method-not-allowed", allowed: this.methods };
    }

    const { typed, fallback } = variants;
    const available = [...typed.keys()];

    if (available.length === 0) {
      return fallback
        ? { kind: "handler", handler: fallback.handler }
        : { kind: "not-acceptable", available };
    }

    if (!accept || accept.trim() === "") {
      if (fallback) return { kind: "handler", handler: fallback.handler };
      const [first] = available;
      const entry = typed.get(first);
      if (entry) return { kind: "handler", handler: entry.handler, contentType: first };
      return { kind: "not-acceptable", available };
    }

    const chosen = negotiate(accept, available);
    const entry = chosen === undefined ? undefined : typed.get(chosen);
    if (entry) {
      return { kind: "handler", handler: entry.handler, contentType: chosen };
    }

    if (fallback) return { kind: "handler", handler: fallback.handler };
    return { kind: "not-acceptable", available };
  }
}
