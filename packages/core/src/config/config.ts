import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "~/errors/build.ts";
import {
  type SwitchyardConfig,
  SwitchyardConfigSchema,
} from "~/config/schema.ts";
import type { LogLevel } from "~/logging/types.ts";
import type { RouterOptions } from "~/router/types.ts";

/**
 * Configuration as written by the application. Every field is optional.
 */
export interface SwitchyardConfigInput {
  prefix?: string;
  development?: boolean;
  serverName?: string;
  defaultContentType?: string;
  router?: Partial<RouterOptions>;
  log?: {
    level?: LogLevel;
    name?: string;
    json?: boolean;
    timestamp?: boolean;
  };
}

/**
 * Fill defaults and validate.
 *
 * @throws {ConfigError} Listing every invalid or unknown field.
 *
 * @example
 * ```typescript
 * const config = resolveConfig({ router: { caseSensitive: false } });
 * config.router.trailingSlash; // "normalize"
 * config.log.level; // "info"
 * ```
 */
export function resolveConfig(
  input: SwitchyardConfigInput = {},
): SwitchyardConfig {
  const candidate = Value.Default(SwitchyardConfigSchema, Value.Clone(input));

  if (Value.Check(SwitchyardConfigSchema, candidate)) {
    return candidate;
  }

  const issues = [...Value.Errors(SwitchyardConfigSchema, candidate)].map(
    (err) => `${err.path || "/"}: ${err.message}`,
  );
  throw new ConfigError(issues);
}
