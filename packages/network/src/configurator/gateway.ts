import type { TopologyDescriptor } from "@pathmesh/topology";
import { externalNetwork, hostAddress, uplinkNetwork, edgeLinkNetwork } from "@pathmesh/topology";
import { run, type ConfigPlan } from "./plan";
import { routeCommand, viaRoute, type StaticRoute } from "./routes";

export interface NodeRoutes {
  node: string;
  routes: StaticRoute[];
}

export interface NodePlan {
  node: string;
  plan: ConfigPlan;
}

/**
 * Routes joining the gateway host's domain with the rest of 11.0.0.0/8.
 *
 * The gateway host reaches every edge subnet of path 0 and every uplink
 * through the gateway router; each path router returns through its uplink;
 * the gateway router defaults to the gateway host.
 */
export function gatewayRoutes(descriptor: TopologyDescriptor): NodeRoutes[] {
  const { nodes, paths } = descriptor.params;
  const external = externalNetwork(nodes);
  const gatewayRouter = descriptor.routers[0];
  const gatewayRouterAddress = hostAddress(external, 1);
  const hostInterface = descriptor.gateway.interfaces[0].name;

  const hostRoutes: StaticRoute[] = [];
  for (let n = 1; n <= nodes; n++) {
    hostRoutes.push(viaRoute(`${edgeLinkNetwork(n, 0)}.0/24`, gatewayRouterAddress, hostInterface));
  }
  for (let j = 1; j <= paths; j++) {
    hostRoutes.push(viaRoute(`${uplinkNetwork(j)}.0/24`, gatewayRouterAddress, hostInterface));
  }

  const result: NodeRoutes[] = [{ node: descriptor.gateway.name, routes: hostRoutes }];

  descriptor.routers.slice(1).forEach((router, offset) => {
    const uplink = `${uplinkNetwork(offset + 1)}.0/24`;
    const intf = router.interfaces.find((i) => i.cidr === uplink);
    if (!intf) return;
    result.push({
      node: router.name,
      routes: [viaRoute(`${external}.0/24`, hostAddress(uplinkNetwork(offset + 1), 1), intf.name)],
    });
  });

  if (gatewayRouter.defaultRoute !== undefined) {
    result.push({ node: gatewayRouter.name, routes: [viaRoute("default", gatewayRouter.defaultRoute)] });
  }

  return result;
}

export function gatewayRoutePlan(descriptor: TopologyDescriptor): NodePlan[] {
  return gatewayRoutes(descriptor).map(({ node, routes }) => ({
    node,
    plan: routes.map((route) => run(routeCommand(route))),
  }));
}
