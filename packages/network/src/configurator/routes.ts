/**
 * Static route model
 *
 * Multi-path redundancy means a prefix can be reachable both through a
 * directly bound device and through a next hop. Every route carries an
 * explicit metric: via routes win with VIA_METRIC, device routes sit at
 * DEVICE_METRIC next to the kernel's connected route.
 */

export const VIA_METRIC = 0;
export const DEVICE_METRIC = 1;

export interface StaticRoute {
  /** Destination in CIDR notation, or "default" */
  prefix: string;
  via?: string;
  device?: string;
  metric: number;
}

export function deviceRoute(prefix: string, device: string): StaticRoute {
  return { prefix, device, metric: DEVICE_METRIC };
}

export function viaRoute(prefix: string, via: string, device?: string): StaticRoute {
  return device === undefined
    ? { prefix, via, metric: VIA_METRIC }
    : { prefix, via, device, metric: VIA_METRIC };
}

export function routeCommand(route: StaticRoute): string {
  const parts = ["ip route add", route.prefix];
  if (route.via !== undefined) parts.push(`via ${route.via}`);
  if (route.device !== undefined) parts.push(`dev ${route.device}`);
  parts.push(`metric ${route.metric}`);
  return parts.join(" ");
}

/**
 * Routes sharing prefix and metric, which the kernel would refuse
 */
export function conflictingRoutes(routes: StaticRoute[]): string[] {
  const seen = new Set<string>();
  const conflicts: string[] = [];
  for (const route of routes) {
    const key = `${route.prefix}@${route.metric}`;
    if (seen.has(key)) conflicts.push(key);
    seen.add(key);
  }
  return conflicts;
}
