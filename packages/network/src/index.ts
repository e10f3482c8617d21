/**
 * @pathmesh/network
 *
 * Emulation fabric interfaces, per-node configuration and the Linux
 * namespace fabric
 */

// Fabric
export type {
  Fabric,
  FabricFactory,
  NodeHandle,
  SwitchHandle,
  LinkState,
  StepHandler,
} from "./fabric";
export { HandlerList } from "./fabric";

// Processes
export type { CommandResult, CommandRunner, RunOptions, StreamingCommand } from "./shell";
export { createShellRunner, runChecked } from "./shell";

// Configuration
export * from "./configurator";

// Linux fabric
export {
  LinuxFabric,
  LinuxFabricFactory,
  LinuxNodeHandle,
  DEFAULT_NAMESPACE_PREFIX,
  type LinuxFabricOptions,
} from "./linux/namespace-fabric";
export { normalFlowCommand, OPENFLOW_VERSION } from "./linux/ovs";
export { NATManager, NFTablesConfig, DEFAULT_NAT_TABLE, type NATConfig } from "./linux/nat";
