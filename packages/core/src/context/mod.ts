export { Context, type ContextInit, type Outcome } from "~/context/context.ts";
export {
  type Constructor,
  createKey,
  type Key,
  type ReadonlyTypeMap,
  TypeKey,
  TypeMap,
} from "~/context/type-map.ts";
