import type { Method } from "~/router/types.ts";
import type { RouteHandler, RouteOptions } from "~/app/types.ts";

/**
 * Route registration surface shared by the application and its groups.
 * A string in place of options is the content type.
 */
export abstract class RouteRegistrar {
  abstract register(
    method: Method,
    pattern: string,
    handler: RouteHandler,
    options?: string | RouteOptions,
  ): this;

  get(
    pattern: string,
    handler: RouteHandler,
    options?: string | RouteOptions,
  ): this {
    return this.register("GET", pattern, handler, options);
  }

  post(
    pattern: string,
    handler: RouteHandler,
    options?: string | RouteOptions,
  ): this {
    return this.register("POST", pattern, handler, options);
  }

  put(
    pattern: string,
    handler: RouteHandler,
    options?: string | RouteOptions,
  ): this {
    return this.register("PUT", pattern, handler, options);
  }

  patch(
    pattern: string,
    handler: RouteHandler,
    options?: string | RouteOptions,
  ): this {
    return this.register("PATCH", pattern, handler, options);
  }

  delete(
    pattern: string,
    handler: RouteHandler,
    options?: string | RouteOptions,
  ): this {
    return this.register("DELETE", pattern, handler, options);
  }

  head(
    pattern: string,
    handler: RouteHandler,
    options?: string | RouteOptions,
  ): this {
    return this.register("HEAD", pattern, handler, options);
  }

  options(
    pattern: string,
    handler: RouteHandler,
    options?: string | RouteOptions,
  ): this {
    return this.register("OPTIONS", pattern, handler, options);
  }
}

export function toRouteOptions(
  options: string | RouteOptions | undefined,
): RouteOptions {
  if (options === undefined) return {};
  return typeof options === "string" ? { contentType: options } : options;
}
