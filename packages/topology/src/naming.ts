// Names derive from (role, index) alone.

export const GATEWAY_HOST = "nat0";

export function gatewayHostName(): string {
  return GATEWAY_HOST;
}

/** Router j, where j = 0 is the gateway router */
export function routerName(j: number): string {
  return `r${j + 1}`;
}

export function edgeName(i: number): string {
  return `n${i}`;
}

export function gatewaySwitchName(): string {
  return "s0";
}

/** Switch between edge i (1-based) and router j */
export function edgeSwitchName(i: number, j: number, paths: number): string {
  return `s${1 + (i - 1) * (paths + 1) + j}`;
}

/** Switch between path router j (1-based) and the gateway router */
export function uplinkSwitchName(j: number, nodes: number, paths: number): string {
  return `s${nodes * (paths + 1) + j}`;
}

export function interfaceName(node: string, ordinal: number): string {
  return `${node}-eth${ordinal}`;
}

export function switchPortName(switchName: string, port: 1 | 2): string {
  return `${switchName}-eth${port}`;
}

/** Link ids share their index with the switch carrying them */
export function linkId(switchName: string): string {
  return `l${switchName.slice(1)}`;
}
