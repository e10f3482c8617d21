/**
 * @pathmesh/topology
 *
 * Deterministic topology and addressing plan for N edge nodes over P paths
 */

export type {
  TopologyParams,
  NodeKind,
  InterfaceDescriptor,
  NodeDescriptor,
  SwitchDescriptor,
  LinkEndpoint,
  LinkDescriptor,
  TopologyDescriptor,
} from "./types";

export {
  buildTopology,
  validateParams,
  hostsOf,
  findNode,
  findLink,
  MAX_NODES,
  MAX_PATHS,
  MAX_GATEWAY_INTERFACES,
} from "./builder";

export {
  GATEWAY_HOST,
  gatewayHostName,
  routerName,
  edgeName,
  gatewaySwitchName,
  edgeSwitchName,
  uplinkSwitchName,
  interfaceName,
  switchPortName,
  linkId,
} from "./naming";

export {
  BASE_OCTET,
  MULTICAST_PREFIX,
  parseCIDR,
  isIPv4,
  ipToNum,
  numToIP,
  firstOctet,
  pathPrefix,
  edgeLinkNetwork,
  externalNetwork,
  uplinkNetwork,
  hostAddress,
  multicastGroup,
  multicastRange,
} from "./addressing";
