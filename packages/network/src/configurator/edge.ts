import type { InterfaceDescriptor, NodeDescriptor } from "@pathmesh/topology";
import { BASE_OCTET, firstOctet, multicastGroup, multicastRange } from "@pathmesh/topology";
import { awaitReady, run, sysctl, type ConfigPlan } from "./plan";
import { deviceRoute, routeCommand, viaRoute, type StaticRoute } from "./routes";
import type { RelayDaemon } from "./relay";

/**
 * What an edge interface needs to know about the path it sits on
 */
export interface EdgePath {
  intf: InterfaceDescriptor;
  /** First octet of every subnet on this path */
  prefix: number;
  /** Router number, 1-based, which is also the path's multicast group octet */
  routerNumber: number;
  /** The path router's address on this edge's link */
  routerAddress: string;
}

export function edgePaths(node: NodeDescriptor): EdgePath[] {
  return node.interfaces.map((intf) => {
    const prefix = firstOctet(intf.address);
    return {
      intf,
      prefix,
      routerNumber: prefix - (BASE_OCTET - 1),
      routerAddress: `${prefix}.0.${node.index}.1`,
    };
  });
}

/** Device-bound route for the path's multicast range */
export function multicastDeviceRoute(path: EdgePath): StaticRoute {
  return deviceRoute(multicastRange(path.routerNumber), path.intf.name);
}

/**
 * Via routes on one path: the multicast range, then every other edge
 * subnet 0..N on the path's prefix.
 */
export function pathRoutes(path: EdgePath, self: number, nodes: number): StaticRoute[] {
  const routes = [viaRoute(multicastRange(path.routerNumber), path.routerAddress, path.intf.name)];
  for (let n = 0; n <= nodes; n++) {
    if (n === self) continue;
    routes.push(viaRoute(`${path.prefix}.0.${n}.0/24`, path.routerAddress, path.intf.name));
  }
  return routes;
}

/**
 * Every static route an edge node ends up with
 */
export function edgeRoutes(node: NodeDescriptor, nodes: number): StaticRoute[] {
  const paths = edgePaths(node);
  const routes = [
    ...paths.map(multicastDeviceRoute),
    ...paths.flatMap((path) => pathRoutes(path, node.index, nodes)),
  ];
  if (node.defaultRoute !== undefined) {
    routes.push(viaRoute("default", node.defaultRoute));
  }
  return routes;
}

export function edgePlan(node: NodeDescriptor, nodes: number, relay: RelayDaemon): ConfigPlan {
  const paths = edgePaths(node);
  const plan: ConfigPlan = [
    sysctl("net.ipv4.icmp_echo_ignore_broadcasts", 0),
    ...paths.map((path) => run(routeCommand(multicastDeviceRoute(path)))),
    run(relay.start()),
    awaitReady(relay.probe()),
  ];

  for (const path of paths) {
    plan.push(run(relay.join(path.intf.name, multicastGroup(path.routerNumber))));
    plan.push(...pathRoutes(path, node.index, nodes).map((route) => run(routeCommand(route))));
  }

  if (node.defaultRoute !== undefined) {
    plan.push(run(routeCommand(viaRoute("default", node.defaultRoute))));
  }
  return plan;
}

// Routes go away with the namespace.
export function edgeTeardownPlan(relay: RelayDaemon): ConfigPlan {
  return [
    run(relay.flush()),
    run(relay.kill()),
    sysctl("net.ipv4.icmp_echo_ignore_broadcasts", 1),
  ];
}
