import { createServer, type Server } from "node:http";
import { decodePath, joinPath, rawPathOf } from "~/app/helpers.ts";
import { Group } from "~/app/group.ts";
import { nodeListener } from "~/app/node.ts";
import { RouteRegistrar, toRouteOptions } from "~/app/registrar.ts";
import type {
  DispatchOptions,
  ListenOptions,
  MethodNotAllowedHandler,
  NotAcceptableHandler,
  NotFoundHandler,
  RouteEntry,
  RouteHandler,
  RouteOptions,
  SwitchyardOptions,
} from "~/app/types.ts";
import { resolveConfig } from "~/config/config.ts";
import type { SwitchyardConfig } from "~/config/schema.ts";
import { Context } from "~/context/context.ts";
import { type Key, TypeMap } from "~/context/type-map.ts";
import { ConflictingPatternError, RouterFrozenError } from "~/errors/build.ts";
import {
  MethodNotAllowedError,
  NotAcceptableError,
  NotFoundError,
} from "~/errors/http.ts";
import type { ErrorTransformer } from "~/errors/types.ts";
import { FilterChain } from "~/filters/chain.ts";
import type {
  AfterFilter,
  BeforeFilter,
  ErrorHook,
  Filter,
} from "~/filters/types.ts";
import { createLogger } from "~/logging/logger.ts";
import type { Logger } from "~/logging/types.ts";
import {
  assemble,
  type AssembledResponse,
  toWebResponse,
} from "~/response/assemble.ts";
import { toOwnedReply } from "~/response/convert.ts";
import type { Reply } from "~/response/reply.ts";
import { Router } from "~/router/tree.ts";
import type { MatchResult, Method } from "~/router/types.ts";

/**
 * The application: routes, filters, shared data and the error replies.
 *
 * Everything is registered during startup; the first dispatch (or an
 * explicit `freeze()`) makes the whole application read-only.
 *
 * @example
 * ```typescript
 * const app = new Switchyard();
 *
 * app.use(requestLogger());
 * app.get("/users/:id", (ctx) => ({ id: ctx.variables.get("id") }));
 * app.get("/files/*path", (ctx) => ctx.text(ctx.params.path));
 *
 * await app.listen({ port: 3000 });
 * ```
 */
export class Switchyard extends RouteRegistrar {
  readonly config: SwitchyardConfig;
  readonly logger: Logger;

  private readonly router: Router<RouteEntry>;
  private readonly routes: RouteEntry[] = [];
  private readonly chains = new Map<RouteEntry, FilterChain>();
  private readonly globals = new TypeMap();
  private readonly beforeFilters: BeforeFilter[] = [];
  private readonly afterFilters: AfterFilter[] = [];
  private readonly transformError: ErrorTransformer | undefined;
  private readonly requestLog: Logger;
  private errorHook: ErrorHook | undefined;
  private globalChain: FilterChain | null = null;
  private isFrozen = false;

  private notFoundHandler: NotFoundHandler = () =>
    new NotFoundError().toReply(this.config.development);
  private methodNotAllowedHandler: MethodNotAllowedHandler = (_ctx, allowed) =>
    new MethodNotAllowedError(allowed).toReply(this.config.development);
  private notAcceptableHandler: NotAcceptableHandler = (_ctx, available) =>
    new NotAcceptableError(available).toReply(this.config.development);

  /**
   * @throws {ConfigError} When the options are invalid.
   */
  constructor(options: SwitchyardOptions = {}) {
    super();
    const { logger, logSink, transformError, ...input } = options;
    this.config = resolveConfig(input);
    this.logger = logger ?? createLogger({
      level: this.config.log.level,
      name: this.config.log.name ?? "switchyard",
      json: this.config.log.json,
      timestamp: this.config.log.timestamp,
      sink: logSink,
    });
    this.requestLog = this.logger.child({ name: "request" });
    this.transformError = transformError;
    this.router = new Router<RouteEntry>(this.config.router);
  }

  get frozen(): boolean {
    return this.isFrozen;
  }

  /**
   * Register a handler. A string in place of options is the content type
   * the handler serves.
   *
   * @throws {RouterFrozenError} After `freeze()`.
   * @throws {ConflictingPatternError} When the pattern conflicts with one
   * already registered.
   */
  register(
    method: Method,
    pattern: string,
    handler: RouteHandler,
    options?: string | RouteOptions,
  ): this {
    const { contentType, before = [], after = [] } = toRouteOptions(options);
    const fullPattern = joinPath(this.config.prefix, pattern);
    const entry: RouteEntry = {
      method,
      pattern: fullPattern,
      contentType,
      handler,
      before: [...before],
      after: [...after],
    };

    try {
      this.router.insert(fullPattern, method, entry, contentType);
    } catch (error) {
      if (error instanceof ConflictingPatternError) {
        this.logger.error("Route registration failed", {
          method,
          pattern: fullPattern,
          error,
        });
      }
      throw error;
    }

    this.routes.push(entry);
    this.logger.debug(`Registered ${method} ${fullPattern}`, {
      contentType,
    });
    return this;
  }

  /**
   * Register routes under a prefix with shared filters.
   */
  group(prefix: string, configure: (group: Group) => void): this {
    const group = new Group(prefix);
    configure(group);
    group.flush(this);
    return this;
  }

  /**
   * Register a before/after filter pair for every request.
   */
  use(filter: Filter): this {
    this.assertOpen("filter");
    if (filter.before) this.beforeFilters.push(filter.before);
    if (filter.after) this.afterFilters.push(filter.after);
    return this;
  }

  before(filter: BeforeFilter): this {
    return this.use({ before: filter });
  }

  after(filter: AfterFilter): this {
    return this.use({ after: filter });
  }

  /**
   * Share a value with every request, read through `ctx.global`.
   * Mutable shared state keeps its own synchronization.
   */
  global<T>(key: Key<T>, value: T): this {
    this.assertOpen("global value");
    this.globals.set(key, value);
    return this;
  }

  onNotFound(handler: NotFoundHandler): this {
    this.assertOpen("not-found handler");
    this.notFoundHandler = handler;
    return this;
  }

  /**
   * Replace the 405 reply. The `Allow` header is added when the reply
   * lacks one.
   */
  onMethodNotAllowed(handler: MethodNotAllowedHandler): this {
    this.assertOpen("method-not-allowed handler");
    this.methodNotAllowedHandler = handler;
    return this;
  }

  onNotAcceptable(handler: NotAcceptableHandler): this {
    this.assertOpen("not-acceptable handler");
    this.notAcceptableHandler = handler;
    return this;
  }

  onError(hook: ErrorHook): this {
    this.assertOpen("error hook");
    this.errorHook = hook;
    return this;
  }

  /**
   * Stop accepting registrations and build the filter chains. Idempotent.
   */
  freeze(): this {
    if (this.isFrozen) return this;

    this.router.freeze();
    this.globals.freeze();

    const shared = {
      onError: this.errorHook,
      transformError: this.transformError,
      development: this.config.development,
    };
    this.globalChain = new FilterChain({
      ...shared,
      before: this.beforeFilters,
      after: this.afterFilters,
    });
    for (const entry of this.routes) {
      this.chains.set(
        entry,
        new FilterChain({
          ...shared,
          before: [...this.beforeFilters, ...entry.before],
          after: [...entry.after, ...this.afterFilters],
        }),
      );
    }

    this.isFrozen = true;
    this.logger.debug("Application frozen", { routes: this.routes.length });
    return this;
  }

  /**
   * Match without dispatching.
   */
  match(method: Method, path: string): MatchResult<RouteEntry> {
    return this.router.match(method, path);
  }

  /**
   * Run one request through routing, negotiation, filters and the handler.
   * Never rejects for request-time failures; those become error replies.
   */
  async dispatch(
    request: Request,
    options: DispatchOptions = {},
  ): Promise<AssembledResponse> {
    this.freeze();

    const path = decodePath(rawPathOf(request.url));
    const match = this.router.match(request.method, path);
    const init = {
      request,
      path,
      global: this.globals,
      log: this.requestLog,
      signal: request.signal,
      stillWanted: options.stillWanted,
    };

    let ctx: Context;
    let handler: RouteHandler;
    let chain = this.sharedChain();

    switch (match.kind) {
      case "no-match": {
        ctx = new Context(init);
        handler = this.notFoundHandler;
        break;
      }
      case "method-not-allowed": {
        ctx = new Context(init);
        handler = this.methodNotAllowed(match.allowed);
        break;
      }
      case "matched": {
        const resolution = match.endpoint.resolve(
          match.method,
          request.headers.get("accept"),
        );
        ctx = new Context({
          ...init,
          variables: match.variables,
          contentType: resolution.kind === "handler"
            ? resolution.contentType
            : undefined,
        });

        if (resolution.kind === "handler") {
          handler = resolution.handler.handler;
          chain = this.chains.get(resolution.handler) ?? chain;
        } else if (resolution.kind === "not-acceptable") {
          const { available } = resolution;
          handler = (current) => this.notAcceptableHandler(current, available);
        } else {
          handler = this.methodNotAllowed(resolution.allowed);
        }
        break;
      }
    }

    const reply = await chain.run(ctx, handler);
    return this.assemble(reply, request.method);
  }

  /**
   * Web-standard entry point.
   *
   * @example
   * ```typescript
   * const res = await app.fetch(new Request("http://localhost/users/42"));
   * ```
   */
  fetch = async (request: Request): Promise<Response> => {
    const assembled = await this.dispatch(request, {
      stillWanted: () => !request.signal.aborted,
    });
    return toWebResponse(assembled);
  };

  /**
   * Serve over Node `http`. Resolves once the server is listening.
   */
  listen(options: ListenOptions = {}): Promise<Server> {
    const port = options.port ?? 8000;
    const hostname = options.hostname ?? "0.0.0.0";

    this.freeze();
    const server = createServer(nodeListener(this, this.logger));

    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, hostname, () => {
        server.off("error", reject);
        const address = server.address();
        const bound = typeof address === "object" && address !== null
          ? address.port
          : port;
        if (options.onListen) {
          options.onListen({ hostname, port: bound });
        } else {
          this.logger.info(`Listening on http://${hostname}:${bound}`);
        }
        resolve(server);
      });
    });
  }

  private methodNotAllowed(allowed: readonly string[]): RouteHandler {
    return async (ctx) => {
      const reply = toOwnedReply(
        await this.methodNotAllowedHandler(ctx, allowed),
      );
      reply.status ??= 405;
      if (!reply.headers.has("Allow")) {
        reply.headers.set("Allow", allowed.join(", "));
      }
      return reply;
    };
  }

  private sharedChain(): FilterChain {
    if (!this.globalChain) {
      this.globalChain = new FilterChain();
    }
    return this.globalChain;
  }

  private assemble(reply: Reply, method: string): AssembledResponse {
    return assemble(reply, {
      method,
      serverName: this.config.serverName || undefined,
      defaultContentType: this.config.defaultContentType,
    });
  }

  private assertOpen(what: string): void {
    if (this.isFrozen) {
      throw new RouterFrozenError(what);
    }
  }
}
