import { joinPath } from "~/app/helpers.ts";
import { RouteRegistrar, toRouteOptions } from "~/app/registrar.ts";
import type { RouteHandler, RouteOptions } from "~/app/types.ts";
import type { AfterFilter, BeforeFilter, Filter } from "~/filters/types.ts";
import type { Method } from "~/router/types.ts";

interface PendingRoute {
  method: Method;
  pattern: string;
  handler: RouteHandler;
  options: RouteOptions;
}

/**
 * Routes under a common prefix sharing filters.
 *
 * Group filters apply to every route of the group, including routes
 * registered before the filter, and run before route filters.
 *
 * @example
 * ```typescript
 * app.group("/api", (api) => {
 *   api.before(requireToken);
 *   api.get("/users", listUsers);
 *   api.group("/admin", (admin) => admin.delete("/users/:id", removeUser));
 * });
 * ```
 */
export class Group extends RouteRegistrar {
  private readonly routes: PendingRoute[] = [];
  private readonly beforeFilters: BeforeFilter[] = [];
  private readonly afterFilters: AfterFilter[] = [];

  constructor(readonly prefix: string) {
    super();
  }

  register(
    method: Method,
    pattern: string,
    handler: RouteHandler,
    options?: string | RouteOptions,
  ): this {
    this.routes.push({
      method,
      pattern: joinPath(this.prefix, pattern),
      handler,
      options: toRouteOptions(options),
    });
    return this;
  }

  before(filter: BeforeFilter): this {
    this.beforeFilters.push(filter);
    return this;
  }

  after(filter: AfterFilter): this {
    this.afterFilters.push(filter);
    return this;
  }

  use(filter: Filter): this {
    if (filter.before) this.beforeFilters.push(filter.before);
    if (filter.after) this.afterFilters.push(filter.after);
    return this;
  }

  group(prefix: string, configure: (group: Group) => void): this {
    const nested = new Group(prefix);
    configure(nested);
    nested.flush(this);
    return this;
  }

  /**
   * Hand every collected route to `target` with the group filters added.
   */
  flush(target: RouteRegistrar): void {
    for (const route of this.routes) {
      target.register(route.method, route.pattern, route.handler, {
        contentType: route.options.contentType,
        before: [...this.beforeFilters, ...(route.options.before ?? [])],
        after: [...(route.options.after ?? []), ...this.afterFilters],
      });
    }
  }
}
