export { FilterChain, type FilterChainOptions } from "~/filters/chain.ts";
export type {
  AfterFilter,
  BeforeFilter,
  ErrorHook,
  Filter,
  FilterResult,
} from "~/filters/types.ts";
export * from "~/filters/builtin/mod.ts";
