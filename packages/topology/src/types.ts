/**
 * Requested topology size
 */
export interface TopologyParams {
  /** Number of edge nodes (N) */
  nodes: number;
  /** Number of redundant paths (P), each served by one path router */
  paths: number;
}

export type NodeKind = "gateway" | "router" | "edge";

export interface InterfaceDescriptor {
  /** `<node>-eth<ordinal>` */
  name: string;
  /** Position in the node's interface list, in construction order */
  ordinal: number;
  address: string;
  prefixLength: 24;
  /** The /24 the interface sits in, e.g. "11.0.1.0/24" */
  cidr: string;
  /** Id of the link this interface terminates */
  link: string;
}

export interface NodeDescriptor {
  name: string;
  kind: NodeKind;
  /** Router index j (0 = gateway router), edge index i, or 0 for the gateway host */
  index: number;
  interfaces: InterfaceDescriptor[];
  /** Next hop of the default route, when the node has one */
  defaultRoute?: string;
}

export interface SwitchDescriptor {
  name: string;
  index: number;
  link: string;
  /** Exactly two ports, one per link endpoint */
  ports: [string, string];
}

export interface LinkEndpoint {
  node: string;
  interface: string;
  address: string;
  /** Switch port the interface is patched into */
  port: string;
}

export interface LinkDescriptor {
  id: string;
  /** Router index the link belongs to (0 = external link and gateway router edge links) */
  path: number;
  switch: string;
  cidr: string;
  a: LinkEndpoint;
  b: LinkEndpoint;
}

export interface TopologyDescriptor {
  params: TopologyParams;
  gateway: NodeDescriptor;
  /** P+1 routers, index 0 is the gateway router */
  routers: NodeDescriptor[];
  edges: NodeDescriptor[];
  switches: SwitchDescriptor[];
  links: LinkDescriptor[];
}
