/**
 * CORS filter.
 */

import type { Filter } from "~/filters/types.ts";
import { Reply } from "~/response/reply.ts";

/**
 * CORS configuration options.
 */
export interface CorsOptions {
  origin?: string;
  methods?: string[];
  headers?: string[];
  credentials?: boolean;
  maxAge?: number;
}

/**
 * Answer preflight `OPTIONS` requests and add CORS headers to every reply.
 *
 * Preflights are answered before routing decides anything, so they succeed
 * even for paths without an `OPTIONS` handler.
 *
 * @example
 * ```typescript
 * app.use(cors({
 *   origin: "https://example.com",
 *   methods: ["GET", "POST"],
 *   headers: ["Content-Type", "Authorization"]
 * }));
 * ```
 */
export function cors(options: CorsOptions = {}): Filter {
  const {
    origin = "*",
    methods = ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
    headers = ["Content-Type", "Authorization"],
    credentials = false,
    maxAge = 86400,
  } = options;

  return {
    name: "cors",
    before: (ctx) => {
      if (ctx.method !== "OPTIONS") return;

      return new Reply({
        status: 204,
        headers: {
          "Access-Control-Allow-Methods": methods.join(", "),
          "Access-Control-Allow-Headers": headers.join(", "),
          "Access-Control-Max-Age": maxAge.toString(),
        },
      });
    },
    after: (_ctx, reply) => {
      reply.headers.set("Access-Control-Allow-Origin", origin);
      if (credentials) {
        reply.headers.set("Access-Control-Allow-Credentials", "true");
      }
    },
  };
}
