import { Result } from "better-result";
import { InvalidParameterError } from "@pathmesh/errors";
import type {
  LinkDescriptor,
  NodeDescriptor,
  NodeKind,
  SwitchDescriptor,
  TopologyDescriptor,
  TopologyParams,
} from "./types";
import {
  edgeName,
  edgeSwitchName,
  gatewayHostName,
  gatewaySwitchName,
  interfaceName,
  linkId,
  routerName,
  switchPortName,
  uplinkSwitchName,
} from "./naming";
import {
  edgeLinkNetwork,
  externalNetwork,
  hostAddress,
  uplinkNetwork,
} from "./addressing";

/** Largest N keeping the external link's third octet valid */
export const MAX_NODES = 253;
/** Largest P keeping the path prefix a valid first octet */
export const MAX_PATHS = 244;
/** The gateway router's interface ordinals double as multicast group octets */
export const MAX_GATEWAY_INTERFACES = 256;

// Host part of each end of a link
const ROUTER_SIDE = 1;
const FAR_SIDE = 2;

function checkCount(
  parameter: string,
  value: number,
  max: number
): Result<number, InvalidParameterError> {
  if (!Number.isInteger(value) || value < 1 || value > max) {
    return Result.err(
      new InvalidParameterError({
        message: `${parameter} must be an integer between 1 and ${max}, got ${value}`,
        parameter,
      })
    );
  }
  return Result.ok(value);
}

export function validateParams(
  params: TopologyParams
): Result<TopologyParams, InvalidParameterError> {
  const nodes = checkCount("nodes", params.nodes, MAX_NODES);
  if (nodes.isErr()) return Result.err(nodes.error);

  const paths = checkCount("paths", params.paths, MAX_PATHS);
  if (paths.isErr()) return Result.err(paths.error);

  if (params.nodes + params.paths + 1 > MAX_GATEWAY_INTERFACES) {
    return Result.err(
      new InvalidParameterError({
        message: `nodes + paths must not exceed ${MAX_GATEWAY_INTERFACES - 1}, got ${params.nodes + params.paths}`,
        parameter: "paths",
      })
    );
  }

  return Result.ok({ nodes: params.nodes, paths: params.paths });
}

interface Attachment {
  node: NodeDescriptor;
  host: number;
}

/**
 * Accumulates nodes, switches and links in construction order.
 * Interface ordinals are handed out as links are attached.
 */
class DescriptorDraft {
  readonly switches: SwitchDescriptor[] = [];
  readonly links: LinkDescriptor[] = [];

  node(name: string, kind: NodeKind, index: number, defaultRoute?: string): NodeDescriptor {
    return defaultRoute === undefined
      ? { name, kind, index, interfaces: [] }
      : { name, kind, index, interfaces: [], defaultRoute };
  }

  connect(path: number, switchName: string, network: string, a: Attachment, b: Attachment): void {
    const id = linkId(switchName);
    const cidr = `${network}.0/24`;
    const ports: [string, string] = [switchPortName(switchName, 1), switchPortName(switchName, 2)];

    const attach = ({ node, host }: Attachment, port: string) => {
      const ordinal = node.interfaces.length;
      const address = hostAddress(network, host);
      const name = interfaceName(node.name, ordinal);
      node.interfaces.push({ name, ordinal, address, prefixLength: 24, cidr, link: id });
      return { node: node.name, interface: name, address, port };
    };

    this.switches.push({ name: switchName, index: this.switches.length, link: id, ports });
    this.links.push({
      id,
      path,
      switch: switchName,
      cidr,
      a: attach(a, ports[0]),
      b: attach(b, ports[1]),
    });
  }
}

/**
 * Build the addressed topology for N edge nodes and P redundant paths.
 *
 * Pure: the same parameters always give the same descriptor.
 *
 * @example
 * ```ts
 * const topology = buildTopology({ nodes: 2, paths: 1 });
 * if (topology.isOk()) {
 *   topology.value.routers.map((r) => r.name); // ["r1", "r2"]
 * }
 * ```
 */
export function buildTopology(
  params: TopologyParams
): Result<TopologyDescriptor, InvalidParameterError> {
  const validated = validateParams(params);
  if (validated.isErr()) return Result.err(validated.error);

  const { nodes, paths } = validated.value;
  const draft = new DescriptorDraft();
  const external = externalNetwork(nodes);

  // Gateway host, gateway router and the external link
  const gateway = draft.node(gatewayHostName(), "gateway", 0);
  const gatewayRouter = draft.node(routerName(0), "router", 0, hostAddress(external, FAR_SIDE));
  draft.connect(0, gatewaySwitchName(), external, { node: gateway, host: FAR_SIDE }, { node: gatewayRouter, host: ROUTER_SIDE });

  const routers = [gatewayRouter];
  for (let j = 1; j <= paths; j++) {
    routers.push(draft.node(routerName(j), "router", j));
  }

  const edges: NodeDescriptor[] = [];
  for (let i = 1; i <= nodes; i++) {
    const edge = draft.node(edgeName(i), "edge", i, hostAddress(edgeLinkNetwork(i, 0), ROUTER_SIDE));
    edges.push(edge);

    routers.forEach((router, j) => {
      draft.connect(
        j,
        edgeSwitchName(i, j, paths),
        edgeLinkNetwork(i, j),
        { node: edge, host: FAR_SIDE },
        { node: router, host: ROUTER_SIDE }
      );
    });
  }

  for (let j = 1; j <= paths; j++) {
    draft.connect(
      j,
      uplinkSwitchName(j, nodes, paths),
      uplinkNetwork(j),
      { node: routers[j], host: FAR_SIDE },
      { node: gatewayRouter, host: ROUTER_SIDE }
    );
  }

  return Result.ok({
    params: { nodes, paths },
    gateway,
    routers,
    edges,
    switches: draft.switches,
    links: draft.links,
  });
}

/**
 * Every host in the topology, gateway host first, then routers, then edges
 */
export function hostsOf(descriptor: TopologyDescriptor): NodeDescriptor[] {
  return [descriptor.gateway, ...descriptor.routers, ...descriptor.edges];
}

export function findNode(
  descriptor: TopologyDescriptor,
  name: string
): NodeDescriptor | undefined {
  return hostsOf(descriptor).find((node) => node.name === name);
}

export function findLink(
  descriptor: TopologyDescriptor,
  id: string
): LinkDescriptor | undefined {
  return descriptor.links.find((link) => link.id === id);
}
