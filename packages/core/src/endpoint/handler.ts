/**
 * Handler shapes accepted by the registry.
 *
 * The registry never depends on concrete handler types, only on this
 * single-method contract.
 */

export type HandlerFn<TContext> = (ctx: TContext) => unknown;

export interface HandlerObject<TContext> {
  handle(ctx: TContext): unknown;
}

export type Handler<TContext> = HandlerFn<TContext> | HandlerObject<TContext>;

/**
 * Run a handler, whichever shape it has.
 */
export function invokeHandler<TContext>(
  handler: Handler<TContext>,
  ctx: TContext,
): unknown {
  return typeof handler === "function" ? handler(ctx) : handler.handle(ctx);
}

export function isHandler(value: unknown): value is Handler<never> {
  return typeof value === "function" ||
    (typeof value === "object" && value !== null && "handle" in value &&
      typeof value.handle === "function");
}
