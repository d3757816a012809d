import type { Filter } from "~/filters/types.ts";

export interface RequestLoggerOptions {
  level?: "trace" | "debug" | "info";
}

/**
 * Log one line per request with method, path, status and duration, through
 * the request's logger.
 *
 * @example
 * ```typescript
 * app.use(requestLogger());
 * // GET /users 200 15ms
 * ```
 */
export function requestLogger(options: RequestLoggerOptions = {}): Filter {
  const level = options.level ?? "info";

  return {
    name: "requestLogger",
    after: (ctx, reply) => {
      const status = reply.status ?? 200;
      const duration = Math.round(performance.now() - ctx.startedAt);
      ctx.log[level](`${ctx.method} ${ctx.path} ${status} ${duration}ms`, {
        method: ctx.method,
        path: ctx.path,
        status,
        duration,
        outcome: ctx.outcome,
      });
    },
  };
}
