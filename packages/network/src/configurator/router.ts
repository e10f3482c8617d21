import type { NodeDescriptor } from "@pathmesh/topology";
import { multicastGroup } from "@pathmesh/topology";
import { awaitReady, run, sysctl, type ConfigPlan } from "./plan";
import { deviceRoute, routeCommand, type StaticRoute } from "./routes";
import type { RelayDaemon } from "./relay";

const ACCEPT_CHAINS = ["INPUT", "FORWARD", "OUTPUT"] as const;

/**
 * One device route per interface for its own /24. The relay daemon
 * resolves groups through the routing table, connected subnets included.
 */
export function routerRoutes(node: NodeDescriptor): StaticRoute[] {
  return node.interfaces.map((intf) => deviceRoute(intf.cidr, intf.name));
}

/**
 * Forwarding, multicast repeating and routes for a router.
 *
 * Each interface k relays group 239.0.k.1 to every other interface, so a
 * path-scoped group is repeated everywhere except where it came from.
 */
export function routerPlan(node: NodeDescriptor, relay: RelayDaemon): ConfigPlan {
  const names = node.interfaces.map((intf) => intf.name);

  return [
    sysctl("net.ipv4.ip_forward", 1),
    sysctl("net.ipv6.conf.all.forwarding", 1),
    sysctl("net.ipv4.icmp_echo_ignore_broadcasts", 0),
    ...names.flatMap((name) => [
      sysctl(`net.ipv4.conf.${name}.force_igmp_version`, 2),
      sysctl(`net.ipv4.conf.${name}.rp_filter`, 0),
    ]),
    run(relay.start()),
    awaitReady(relay.probe()),
    ...node.interfaces.map((intf) =>
      run(
        relay.add(
          intf.name,
          multicastGroup(intf.ordinal),
          names.filter((name) => name !== intf.name)
        )
      )
    ),
    ...routerRoutes(node).map((route) => run(routeCommand(route))),
    ...ACCEPT_CHAINS.map((chain) => run(`iptables -A ${chain} -j ACCEPT`)),
  ];
}

export function routerTeardownPlan(node: NodeDescriptor, relay: RelayDaemon): ConfigPlan {
  return [
    sysctl("net.ipv4.ip_forward", 0),
    sysctl("net.ipv6.conf.all.forwarding", 0),
    sysctl("net.ipv4.icmp_echo_ignore_broadcasts", 1),
    ...node.interfaces.flatMap((intf) => [
      sysctl(`net.ipv4.conf.${intf.name}.force_igmp_version`, 0),
      sysctl(`net.ipv4.conf.${intf.name}.rp_filter`, 1),
    ]),
    run(relay.flush()),
    run(relay.kill()),
    ...ACCEPT_CHAINS.map((chain) => run(`iptables -D ${chain} -j ACCEPT`)),
  ];
}
