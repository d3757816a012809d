import type { Context } from "~/context/context.ts";
import type { SwitchyardConfigInput } from "~/config/config.ts";
import type { Handler } from "~/endpoint/handler.ts";
import type { ErrorTransformer } from "~/errors/types.ts";
import type { AfterFilter, BeforeFilter } from "~/filters/types.ts";
import type { Logger, LogSink } from "~/logging/types.ts";

export type RouteHandler = Handler<Context>;

export interface SwitchyardOptions extends SwitchyardConfigInput {
  /** Use this logger instead of building one from `log`. */
  logger?: Logger;
  /** Where log lines go when the logger is built from `log`. */
  logSink?: LogSink;
  transformError?: ErrorTransformer;
}

export interface RouteOptions {
  /** Serve this handler only when negotiation picks this media type. */
  contentType?: string;
  /** Filters for this route, run after the global ones. */
  before?: readonly BeforeFilter[];
  /** Filters for this route, run before the global ones. */
  after?: readonly AfterFilter[];
}

/**
 * One registration, as stored on the endpoint.
 */
export interface RouteEntry {
  readonly method: string;
  readonly pattern: string;
  readonly contentType: string | undefined;
  readonly handler: RouteHandler;
  readonly before: readonly BeforeFilter[];
  readonly after: readonly AfterFilter[];
}

export type NotFoundHandler = (ctx: Context) => unknown;

export type MethodNotAllowedHandler = (
  ctx: Context,
  allowed: readonly string[],
) => unknown;

export type NotAcceptableHandler = (
  ctx: Context,
  available: readonly string[],
) => unknown;

export interface DispatchOptions {
  /** Polled between streamed chunks; false stops the body. */
  stillWanted?: () => boolean;
}

export interface ListenOptions {
  port?: number;
  hostname?: string;
  onListen?: (params: { hostname: string; port: number }) => void;
}
