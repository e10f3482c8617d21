export { NodeConfigurator, type NodeConfiguratorOptions } from "./configurator";
export { type ConfigAction, type ConfigPlan, run, awaitReady, sysctl, commandsOf } from "./plan";
export { RelayDaemon, DEFAULT_RELAY, type RelayBinaries } from "./relay";
export {
  type StaticRoute,
  VIA_METRIC,
  DEVICE_METRIC,
  deviceRoute,
  viaRoute,
  routeCommand,
  conflictingRoutes,
} from "./routes";
export { routerPlan, routerTeardownPlan, routerRoutes } from "./router";
export { edgePlan, edgeTeardownPlan, edgeRoutes, edgePaths, pathRoutes, type EdgePath } from "./edge";
export { gatewayRoutes, gatewayRoutePlan, type NodeRoutes, type NodePlan } from "./gateway";
