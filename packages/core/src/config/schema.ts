import { type Static, Type } from "@sinclair/typebox";
import { TEXT_CONTENT_TYPE } from "~/response/reply.ts";

export const RouterOptionsSchema = Type.Object({
  caseSensitive: Type.Boolean({ default: true }),
  trailingSlash: Type.Union([
    Type.Literal("normalize"),
    Type.Literal("strict"),
  ], { default: "normalize" }),
  allowWildcards: Type.Boolean({ default: true }),
}, { default: {}, additionalProperties: false });

export const LogOptionsSchema = Type.Object({
  level: Type.Union([
    Type.Literal("trace"),
    Type.Literal("debug"),
    Type.Literal("info"),
    Type.Literal("warn"),
    Type.Literal("error"),
    Type.Literal("fatal"),
    Type.Literal("silent"),
  ], { default: "info" }),
  name: Type.Optional(Type.String()),
  json: Type.Boolean({ default: false }),
  timestamp: Type.Boolean({ default: true }),
}, { default: {}, additionalProperties: false });

export const SwitchyardConfigSchema = Type.Object({
  /** Prefix joined in front of every registered pattern. */
  prefix: Type.String({ default: "/", pattern: "^/" }),
  /** Include error details and stacks in error replies. */
  development: Type.Boolean({ default: false }),
  /** `Server` header value; empty to omit it. */
  serverName: Type.String({ default: "switchyard" }),
  /** `Content-Type` for replies with a body and none set. */
  defaultContentType: Type.String({ default: TEXT_CONTENT_TYPE }),
  router: RouterOptionsSchema,
  log: LogOptionsSchema,
}, { additionalProperties: false });

export type SwitchyardConfig = Static<typeof SwitchyardConfigSchema>;

export type LogOptions = Static<typeof LogOptionsSchema>;
