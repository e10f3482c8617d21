import { describe, it, expect } from "vitest";
import { buildTopology, hostsOf, findNode, findLink, validateParams } from "../builder";
import type { TopologyDescriptor } from "../types";

function build(nodes: number, paths: number): TopologyDescriptor {
  return buildTopology({ nodes, paths }).unwrap();
}

const endpoints = (topology: TopologyDescriptor, a: string, b: string) => {
  const link = topology.links.find((l) => l.a.node === a && l.b.node === b);
  return link ? [link.b.address, link.a.address] : undefined;
};

describe("buildTopology", () => {
  describe("two edges over one path", () => {
    const topology = build(2, 1);

    it("names routers, edges and the gateway host", () => {
      expect(topology.routers.map((r) => r.name)).toEqual(["r1", "r2"]);
      expect(topology.edges.map((e) => e.name)).toEqual(["n1", "n2"]);
      expect(topology.gateway.name).toBe("nat0");
    });

    it("addresses edge links by path prefix", () => {
      expect(endpoints(topology, "n1", "r1")).toEqual(["11.0.1.1", "11.0.1.2"]);
      expect(endpoints(topology, "n1", "r2")).toEqual(["12.0.1.1", "12.0.1.2"]);
      expect(endpoints(topology, "n2", "r2")).toEqual(["12.0.2.1", "12.0.2.2"]);
    });

    it("addresses the uplink under the gateway prefix", () => {
      expect(endpoints(topology, "r2", "r1")).toEqual(["11.12.1.1", "11.12.1.2"]);
    });

    it("puts the external link after the last edge subnet", () => {
      expect(endpoints(topology, "nat0", "r1")).toEqual(["11.0.3.1", "11.0.3.2"]);
      expect(topology.routers[0].defaultRoute).toBe("11.0.3.2");
    });

    it("assigns interface ordinals in construction order", () => {
      const r1 = topology.routers[0];
      expect(r1.interfaces.map((i) => `${i.name}=${i.address}`)).toEqual([
        "r1-eth0=11.0.3.1",
        "r1-eth1=11.0.1.1",
        "r1-eth2=11.0.2.1",
        "r1-eth3=11.12.1.1",
      ]);
      expect(topology.routers[1].interfaces.map((i) => i.name)).toEqual(["r2-eth0", "r2-eth1", "r2-eth2"]);
      expect(topology.edges[1].interfaces.map((i) => i.name)).toEqual(["n2-eth0", "n2-eth1"]);
    });

    it("routes edges through the gateway router by default", () => {
      expect(topology.edges.map((e) => e.defaultRoute)).toEqual(["11.0.1.1", "11.0.2.1"]);
      expect(topology.routers[1].defaultRoute).toBeUndefined();
    });

    it("gives every link its own two-port switch", () => {
      expect(topology.switches.map((s) => s.name)).toEqual(["s0", "s1", "s2", "s3", "s4", "s5"]);
      const uplink = findLink(topology, "l5");
      expect(uplink?.switch).toBe("s5");
      expect(uplink?.a.port).toBe("s5-eth1");
      expect(uplink?.b.port).toBe("s5-eth2");
      expect(uplink?.path).toBe(1);
    });
  });

  it.each([
    [1, 1],
    [3, 2],
    [5, 4],
    [20, 10],
    [253, 2],
    [11, 244],
  ])("produces the expected counts and unique subnets for N=%i, P=%i", (nodes, paths) => {
    const topology = build(nodes, paths);

    expect(topology.edges).toHaveLength(nodes);
    expect(topology.routers).toHaveLength(paths + 1);
    expect(topology.links).toHaveLength(1 + nodes * (paths + 1) + paths);
    expect(topology.switches).toHaveLength(topology.links.length);

    const cidrs = topology.links.map((l) => l.cidr);
    expect(new Set(cidrs).size).toBe(cidrs.length);

    for (const host of hostsOf(topology)) {
      const subnets = host.interfaces.map((i) => i.cidr);
      expect(new Set(subnets).size).toBe(subnets.length);
    }
  });

  it("derives switch names from role and index", () => {
    const topology = build(3, 2);
    const n2r3 = topology.links.find((l) => l.a.node === "n2" && l.b.node === "r3");
    const r3r1 = topology.links.find((l) => l.a.node === "r3" && l.b.node === "r1");

    expect(n2r3?.switch).toBe("s6");
    expect(r3r1?.switch).toBe("s11");
  });

  it("is pure", () => {
    expect(JSON.stringify(build(4, 3))).toBe(JSON.stringify(build(4, 3)));
  });

  describe("parameter validation", () => {
    it.each([
      [{ nodes: 0, paths: 1 }, "nodes"],
      [{ nodes: -2, paths: 1 }, "nodes"],
      [{ nodes: 1.5, paths: 1 }, "nodes"],
      [{ nodes: 254, paths: 1 }, "nodes"],
      [{ nodes: 2, paths: 0 }, "paths"],
      [{ nodes: 2, paths: 245 }, "paths"],
      [{ nodes: 200, paths: 56 }, "paths"],
    ])("rejects %o naming %s", (params, parameter) => {
      const result = buildTopology(params);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error._tag).toBe("InvalidParameterError");
        expect(result.error.parameter).toBe(parameter);
      }
    });

    it("accepts the largest combined size", () => {
      expect(validateParams({ nodes: 200, paths: 55 }).isOk()).toBe(true);
    });
  });
});

describe("hostsOf / findNode", () => {
  const topology = build(2, 2);

  it("lists the gateway host, routers and edges in order", () => {
    expect(hostsOf(topology).map((n) => n.name)).toEqual(["nat0", "r1", "r2", "r3", "n1", "n2"]);
  });

  it("finds nodes by name", () => {
    expect(findNode(topology, "r3")?.kind).toBe("router");
    expect(findNode(topology, "n2")?.index).toBe(2);
    expect(findNode(topology, "s1")).toBeUndefined();
  });
});
