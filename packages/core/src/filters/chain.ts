import type { Context } from "~/context/context.ts";
import { type Handler, invokeHandler } from "~/endpoint/handler.ts";
import type { SwitchyardError } from "~/errors/base.ts";
import { defaultErrorTransformer } from "~/errors/transformer.ts";
import type { ErrorTransformer } from "~/errors/types.ts";
import type {
  AfterFilter,
  BeforeFilter,
  ErrorHook,
  Filter,
} from "~/filters/types.ts";
import { toOwnedReply } from "~/response/convert.ts";
import { Reply } from "~/response/reply.ts";

export interface FilterChainOptions {
  before?: readonly BeforeFilter[];
  after?: readonly AfterFilter[];
  onError?: ErrorHook;
  transformError?: ErrorTransformer;
  /** Include error details and stacks in error replies. */
  development?: boolean;
}

/**
 * Ordered before/after filters around one handler call.
 *
 * Nothing thrown by a filter, the handler or an error hook leaves
 * {@link FilterChain.run}; every failure becomes a reply.
 */
export class FilterChain {
  readonly before: readonly BeforeFilter[];
  readonly after: readonly AfterFilter[];
  private readonly onError: ErrorHook | undefined;
  private readonly transformError: ErrorTransformer;
  private readonly development: boolean;

  constructor(options: FilterChainOptions = {}) {
    this.before = Object.freeze([...(options.before ?? [])]);
    this.after = Object.freeze([...(options.after ?? [])]);
    this.onError = options.onError;
    this.transformError = options.transformError ?? defaultErrorTransformer;
    this.development = options.development ?? false;
  }

  static from(
    filters: readonly Filter[],
    options: Omit<FilterChainOptions, "before" | "after"> = {},
  ): FilterChain {
    const before: BeforeFilter[] = [];
    const after: AfterFilter[] = [];
    for (const filter of filters) {
      if (filter.before) before.push(filter.before);
      if (filter.after) after.push(filter.after);
    }
    return new FilterChain({ ...options, before, after });
  }

  /**
   * Run before-filters, the handler, then every after-filter.
   *
   * A before-filter returning a reply skips the remaining before-filters
   * and the handler. After-filters run in registration order whatever
   * happened, and `ctx.outcome` tells them what did.
   */
  async run(ctx: Context, handler: Handler<Context>): Promise<Reply> {
    const pending = new Reply();
    let reply: Reply;

    try {
      const aborted = await this.runBefore(ctx, pending);
      if (aborted) {
        ctx.outcome = "aborted";
        reply = aborted === pending ? pending : aborted.clone();
      } else {
        reply = toOwnedReply(await invokeHandler(handler, ctx));
        reply.status ??= pending.status;
        ctx.outcome = "completed";
      }
    } catch (error) {
      ctx.outcome = "failed";
      reply = await this.recover(error, ctx);
    }

    if (reply !== pending) {
      reply.headers.inherit(pending.headers);
    }

    for (const filter of this.after) {
      try {
        const replaced = await filter(ctx, reply);
        if (replaced instanceof Reply && replaced !== reply) {
          reply = replaced.clone();
        }
      } catch (error) {
        ctx.outcome = "failed";
        reply = await this.recover(error, ctx);
      }
    }

    return reply;
  }

  /**
   * Turn a thrown value into a reply, through the error hook when one is
   * set. Non-operational failures are logged with their cause.
   */
  async recover(error: unknown, ctx: Context): Promise<Reply> {
    const failure = this.transform(error, ctx);

    if (!failure.isOperational) {
      ctx.log.error(`${ctx.method} ${ctx.path} failed`, {
        code: failure.code,
        error: failure.cause ?? failure,
      });
    }

    if (this.onError) {
      try {
        const custom = await this.onError(failure, ctx);
        if (custom instanceof Reply) {
          return custom.clone();
        }
      } catch (hookError) {
        ctx.log.error("Error hook failed", { error: hookError });
      }
    }

    try {
      return failure.toReply(this.development);
    } catch (renderError) {
      ctx.log.error("Error reply failed", { error: renderError });
      const { message, code, status } = failure;
      return Reply.json({ error: { message, code, status } }, status);
    }
  }

  private transform(error: unknown, ctx: Context): SwitchyardError {
    try {
      return this.transformError(error);
    } catch (transformError) {
      ctx.log.error("Error transformer failed", { error: transformError });
      return defaultErrorTransformer(error);
    }
  }

  private async runBefore(
    ctx: Context,
    pending: Reply,
  ): Promise<Reply | undefined> {
    for (const filter of this.before) {
      const result = await filter(ctx, pending);
      if (result instanceof Reply) {
        return result;
      }
    }
    return undefined;
  }
}

