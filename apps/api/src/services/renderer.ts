import type { Result } from "better-result";
import type { FabricError } from "@pathmesh/errors";
import type { CommandRunner } from "@pathmesh/network";
import { hostsOf, type NodeKind } from "@pathmesh/topology";
import type { NetworkSnapshot } from "./control-plane";

/**
 * Draws a running network as an image
 */
export interface TopologyRenderer {
  readonly contentType: string;
  render(snapshot: NetworkSnapshot): Promise<Result<Buffer, FabricError>>;
}

const NODE_COLORS: Record<NodeKind, string> = {
  gateway: "forestgreen",
  router: "orange",
  edge: "skyblue",
};

// One color per router, cycled
const PATH_COLORS = [
  "#1f77b4",
  "#ff7f0e",
  "#2ca02c",
  "#d62728",
  "#9467bd",
  "#8c564b",
  "#e377c2",
  "#7f7f7f",
  "#bcbd22",
  "#17becf",
];

const quote = (value: string) => `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;

/**
 * Graphviz source for a snapshot. Hosts of one kind share a rank, and
 * every link is drawn through its switch in the color of its path.
 * Links that are down are dashed.
 */
export function toDot(snapshot: NetworkSnapshot): string {
  const { descriptor, links } = snapshot;
  const status = new Map(links.map((link) => [link.intf1, link.status]));
  const lines: string[] = [
    "graph topology {",
    '  graph [rankdir=TB, splines=true, nodesep=0.4, fontname="Helvetica"];',
    '  node [style=filled, fontname="Helvetica", fontcolor=white, fontsize=10];',
    '  edge [fontname="Helvetica", fontsize=8, fontcolor=gray30, penwidth=2];',
  ];

  for (const node of hostsOf(descriptor)) {
    const shape = node.kind === "router" ? "box" : "ellipse";
    lines.push(`  ${quote(node.name)} [shape=${shape}, fillcolor=${NODE_COLORS[node.kind]}];`);
  }
  for (const sw of descriptor.switches) {
    lines.push(`  ${quote(sw.name)} [shape=point, width=0.15, fillcolor=gray50, xlabel=${quote(sw.name)}];`);
  }

  const rank = (names: string[]) => `  { rank=same; ${names.map(quote).join("; ")}; }`;
  lines.push(rank([descriptor.gateway.name]));
  lines.push(rank(descriptor.routers.map((r) => r.name)));
  lines.push(rank(descriptor.edges.map((e) => e.name)));

  for (const link of descriptor.links) {
    const color = PATH_COLORS[link.path % PATH_COLORS.length];
    const style = status.get(link.a.interface) === "down" ? "dashed" : "solid";
    const attrs = `color=${quote(color)}, style=${style}`;
    lines.push(`  ${quote(link.a.node)} -- ${quote(link.switch)} [${attrs}, label=${quote(link.a.address)}];`);
    lines.push(`  ${quote(link.switch)} -- ${quote(link.b.node)} [${attrs}, label=${quote(link.b.address)}];`);
  }

  lines.push("}");
  return `${lines.join("\n")}\n`;
}

/**
 * Renders through the Graphviz `dot` binary, feeding the source on stdin
 */
export class GraphvizRenderer implements TopologyRenderer {
  readonly contentType = "image/png";

  constructor(
    private readonly runner: CommandRunner,
    private readonly binary = "dot"
  ) {}

  render(snapshot: NetworkSnapshot): Promise<Result<Buffer, FabricError>> {
    return this.runner.output([this.binary, "-Tpng"], { input: toDot(snapshot) });
  }
}
