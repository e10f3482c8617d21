/**
 * Open vSwitch command builders
 *
 * Bridges start in secure fail mode with OpenFlow 1.3, so nothing is
 * forwarded until a flow is installed.
 */

export const OPENFLOW_VERSION = "OpenFlow13";

export function addBridge(name: string): string[] {
  return [
    "ovs-vsctl", "--may-exist", "add-br", name,
    "--", "set", "bridge", name, "fail-mode=secure", `protocols=${OPENFLOW_VERSION}`,
  ];
}

export function deleteBridge(name: string): string[] {
  return ["ovs-vsctl", "--if-exists", "del-br", name];
}

export function addPort(bridge: string, port: string): string[] {
  return ["ovs-vsctl", "--may-exist", "add-port", bridge, port];
}

/**
 * Lowest-priority flow handing every packet to the normal L2 pipeline
 */
export function normalFlowCommand(bridge: string): string {
  return `ovs-ofctl add-flow ${bridge} "cookie=0x0,priority=0,actions=NORMAL" -O ${OPENFLOW_VERSION}`;
}
