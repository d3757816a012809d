export { resolveConfig, type SwitchyardConfigInput } from "~/config/config.ts";
export {
  type LogOptions,
  LogOptionsSchema,
  RouterOptionsSchema,
  type SwitchyardConfig,
  SwitchyardConfigSchema,
} from "~/config/schema.ts";
