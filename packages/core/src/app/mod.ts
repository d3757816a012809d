export { Switchyard } from "~/app/switchyard.ts";
export { Group } from "~/app/group.ts";
export { RouteRegistrar } from "~/app/registrar.ts";
export { decodePath, joinPath, rawPathOf } from "~/app/helpers.ts";
export {
  type Dispatcher,
  nodeListener,
  type NodeRequestSource,
  type NodeResponseSink,
  toWebRequest,
  writeToNode,
} from "~/app/node.ts";
export type {
  DispatchOptions,
  ListenOptions,
  MethodNotAllowedHandler,
  NotAcceptableHandler,
  NotFoundHandler,
  RouteEntry,
  RouteHandler,
  RouteOptions,
  SwitchyardOptions,
} from "~/app/types.ts";
