import { Endpoint } from "~/endpoint/endpoint.ts";
import { ConflictingPatternError, RouterFrozenError } from "~/errors/build.ts";
import { parsePattern, splitPath } from "~/router/segments.ts";
import {
  DEFAULT_ROUTER_OPTIONS,
  type MatchResult,
  type Method,
  type RouteDefinition,
  type RouterOptions,
} from "~/router/types.ts";
import { Variables } from "~/router/variables.ts";

const NO_MATCH = Object.freeze({ kind: "no-match" as const });

interface NamedChild<H> {
  name: string;
  node: TreeNode<H>;
}

interface TreeNode<H> {
  statics: Map<string, TreeNode<H>>;
  variable: NamedChild<H> | null;
  wildcard: NamedChild<H> | null;
  endpoint: Endpoint<H> | null;
}

function createNode<H>(): TreeNode<H> {
  return {
    statics: new Map(),
    variable: null,
    wildcard: null,
    endpoint: null,
  };
}

/**
 * Prefix tree over path segments mapping a method and a path to an
 * endpoint and its variable bindings.
 *
 * The tree is append-only until `freeze()`; afterwards it is read-only and
 * can be shared by every request.
 *
 * @example
 * ```typescript
 * const router = new Router<string>();
 * router.insert("/users/:id", "GET", "show");
 * router.insert("/files/*path", "GET", "download");
 * router.freeze();
 *
 * const match = router.match("GET", "/files/a/b.txt");
 * if (match.kind === "matched") {
 *   match.variables.get("path"); // "a/b.txt"
 * }
 * ```
 */
export class Router<H> {
  readonly options: Readonly<RouterOptions>;
  private readonly root: TreeNode<H> = createNode();
  private readonly staticRoutes = new Map<string, TreeNode<H>>();
  private isFrozen = false;

  constructor(options: Partial<RouterOptions> = {}) {
    this.options = Object.freeze({ ...DEFAULT_ROUTER_OPTIONS, ...options });
  }

  /**
   * Insert every definition and freeze the result.
   *
   * @throws {ConflictingPatternError} On the first conflicting pattern.
   */
  static build<H>(
    routes: Iterable<RouteDefinition<H>>,
    options: Partial<RouterOptions> = {},
  ): Router<H> {
    const router = new Router<H>(options);
    for (const route of routes) {
      router.insert(route.pattern, route.method, route.handler, route.contentType);
    }
    return router.freeze();
  }

  get frozen(): boolean {
    return this.isFrozen;
  }

  /**
   * Register a handler for a pattern and a method, optionally restricted
   * to one negotiated content type.
   *
   * @throws {RouterFrozenError} After `freeze()`.
   * @throws {ConflictingPatternError} When the pattern names a variable
   * differently from a pattern already registered at the same position.
   */
  insert(
    pattern: string,
    method: Method,
    handler: H,
    contentType?: string,
  ): this {
    if (this.isFrozen) {
      throw new RouterFrozenError(`${method} ${pattern}`);
    }

    const segments = parsePattern(pattern, this.options);
    let node = this.root;
    let isStatic = true;
    const texts: string[] = [];

    for (const segment of segments) {
      switch (segment.kind) {
        case "static": {
          texts.push(segment.text);
          const key = this.fold(segment.text);
          let child = node.statics.get(key);
          if (!child) {
            child = createNode();
            node.statics.set(key, child);
          }
          node = child;
          break;
        }
        case "variable":
        case "wildcard": {
          isStatic = false;
          const slot = segment.kind === "variable" ? "variable" : "wildcard";
          const sigil = segment.kind === "variable" ? ":" : "*";
          let child = node[slot];
          if (!child) {
            child = { name: segment.name, node: createNode() };
            node[slot] = child;
          } else if (child.name !== segment.name) {
            throw new ConflictingPatternError(
              pattern,
              `${sigil}${segment.name} conflicts with ${sigil}${child.name} registered at the same position`,
            );
          }
          node = child.node;
          break;
        }
      }
    }

    const endpoint = node.endpoint ?? new Endpoint<H>(pattern);
    endpoint.register(method, handler, contentType);
    node.endpoint = endpoint;

    if (isStatic) {
      this.staticRoutes.set(this.staticKey(texts), node);
    }

    return this;
  }

  /**
   * Alias of `insert`.
   */
  register(
    pattern: string,
    method: Method,
    handler: H,
    contentType?: string,
  ): this {
    return this.insert(pattern, method, handler, contentType);
  }

  /**
   * Stop accepting registrations, on the tree and on every endpoint.
   * Idempotent.
   */
  freeze(): this {
    if (this.isFrozen) return this;
    for (const endpoint of this.endpoints()) {
      endpoint.freeze();
    }
    this.isFrozen = true;
    return this;
  }

  /**
   * Match a method and a decoded path.
   *
   * The most specific terminal endpoint wins (static, then variable, then
   * wildcard, backtracking at every level). Method resolution happens on
   * that endpoint only.
   */
  match(method: Method, path: string): MatchResult<H> {
    const segments = splitPath(path, this.options);
    const bindings: Array<[string, string]> = [];

    const node = this.staticRoutes.get(this.staticKey(segments)) ??
      this.find(this.root, segments, 0, bindings);
    const endpoint = node?.endpoint;

    if (!endpoint) return NO_MATCH;

    const served = endpoint.serves(method);
    if (served === undefined) {
      return { kind: "method-not-allowed", allowed: endpoint.methods };
    }

    return {
      kind: "matched",
      endpoint,
      pattern: endpoint.pattern,
      method: served,
      variables: new Variables(bindings),
    };
  }

  /**
   * Every registered endpoint, depth-first in static > variable > wildcard
   * order.
   */
  endpoints(): Endpoint<H>[] {
    const found: Endpoint<H>[] = [];
    const visit = (node: TreeNode<H>): void => {
      if (node.endpoint) found.push(node.endpoint);
      for (const child of node.statics.values()) visit(child);
      if (node.variable) visit(node.variable.node);
      if (node.wildcard) visit(node.wildcard.node);
    };
    visit(this.root);
    return found;
  }

  private find(
    node: TreeNode<H>,
    segments: readonly string[],
    index: number,
    bindings: Array<[string, string]>,
  ): TreeNode<H> | null {
    if (index === segments.length) {
      if (node.endpoint) return node;
      const wildcard = node.wildcard;
      if (wildcard?.node.endpoint) {
        bindings.push([wildcard.name, ""]);
        return wildcard.node;
      }
      return null;
    }

    const segment = segments[index];

    const staticChild = node.statics.get(this.fold(segment));
    if (staticChild) {
      const found = this.find(staticChild, segments, index + 1, bindings);
      if (found) return found;
    }

    const variable = node.variable;
    if (variable && segment !== "") {
      bindings.push([variable.name, segment]);
      const found = this.find(variable.node, segments, index + 1, bindings);
      if (found) return found;
      bindings.pop();
    }

    const wildcard = node.wildcard;
    if (wildcard?.node.endpoint) {
      bindings.push([wildcard.name, segments.slice(index).join("/")]);
      return wildcard.node;
    }

    return null;
  }

  private fold(text: string): string {
    return this.options.caseSensitive ? text : text.toLowerCase();
  }

  private staticKey(segments: readonly string[]): string {
    return segments.map((segment) => this.fold(segment)).join("/");
  }
}
