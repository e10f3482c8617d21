import { describe, it, expect } from "vitest";
import { buildTopology } from "@pathmesh/topology";
import { LinuxFabric, LinuxFabricFactory, interfacesUp } from "../linux/namespace-fabric";
import type { RunOptions } from "../shell";
import { RecordingRunner, type Responder } from "./helpers/recording";

// nat0, r1, r2, n1; links l0 nat0-r1, l1 n1-r1, l2 n1-r2, l3 r2-r1
const topology = buildTopology({ nodes: 1, paths: 1 }).unwrap();

function fabricWith(respond?: Responder, nat: { subnet: string; externalInterface?: string } | false = false) {
  const runner = new RecordingRunner(respond);
  const fabric = new LinuxFabricFactory({ runner, nat }).create(topology);
  return { runner, fabric };
}

function sliceFrom(lines: string[], first: string, length: number): string[] {
  const start = lines.indexOf(first);
  return start === -1 ? [] : lines.slice(start, start + length);
}

describe("LinuxFabric", () => {
  describe("start", () => {
    it("clears leftovers before creating anything", async () => {
      const { runner, fabric } = fabricWith();
      await fabric.start();

      expect(runner.lines().slice(0, 8)).toEqual([
        "ovs-vsctl --if-exists del-br s0",
        "ovs-vsctl --if-exists del-br s1",
        "ovs-vsctl --if-exists del-br s2",
        "ovs-vsctl --if-exists del-br s3",
        "ip link del nat0-eth0",
        "ip netns del pm-r1",
        "ip netns del pm-r2",
        "ip netns del pm-n1",
      ]);
    });

    it("gives every router and edge a namespace with loopback up", async () => {
      const { runner, fabric } = fabricWith();
      const result = await fabric.start();

      expect(result.isOk()).toBe(true);
      expect(sliceFrom(runner.lines(), "ip netns add pm-r1", 6)).toEqual([
        "ip netns add pm-r1",
        "ip netns exec pm-r1 ip link set lo up",
        "ip netns add pm-r2",
        "ip netns exec pm-r2 ip link set lo up",
        "ip netns add pm-n1",
        "ip netns exec pm-n1 ip link set lo up",
      ]);
      expect(runner.lines()).not.toContain("ip netns add pm-nat0");
    });

    it("creates secure OpenFlow 1.3 bridges", async () => {
      const { runner, fabric } = fabricWith();
      await fabric.start();

      expect(sliceFrom(runner.lines(), "ovs-vsctl --may-exist add-br s1 -- set bridge s1 fail-mode=secure protocols=OpenFlow13", 2)).toEqual([
        "ovs-vsctl --may-exist add-br s1 -- set bridge s1 fail-mode=secure protocols=OpenFlow13",
        "ip link set s1 up",
      ]);
    });

    it("patches namespaced interfaces into their switch", async () => {
      const { runner, fabric } = fabricWith();
      await fabric.start();

      expect(sliceFrom(runner.lines(), "ip link add n1-eth1 type veth peer name s2-eth1", 6)).toEqual([
        "ip link add n1-eth1 type veth peer name s2-eth1",
        "ip link set n1-eth1 netns pm-n1",
        "ip netns exec pm-n1 ip addr add 12.0.1.2/24 dev n1-eth1",
        "ip netns exec pm-n1 ip link set n1-eth1 up",
        "ovs-vsctl --may-exist add-port s2 s2-eth1",
        "ip link set s2-eth1 up",
      ]);
    });

    it("keeps the gateway host interface in the root namespace", async () => {
      const { runner, fabric } = fabricWith();
      await fabric.start();

      expect(sliceFrom(runner.lines(), "ip link add nat0-eth0 type veth peer name s0-eth1", 5)).toEqual([
        "ip link add nat0-eth0 type veth peer name s0-eth1",
        "ip addr add 11.0.2.2/24 dev nat0-eth0",
        "ip link set nat0-eth0 up",
        "ovs-vsctl --may-exist add-port s0 s0-eth1",
        "ip link set s0-eth1 up",
      ]);
    });

    it("masquerades through nftables when available", async () => {
      const { runner, fabric } = fabricWith(undefined, { subnet: "11.0.0.0/8", externalInterface: "eth9" });
      const result = await fabric.start();

      expect(result.isOk()).toBe(true);
      expect(runner.lines().slice(-4)).toEqual([
        "sysctl -w net.ipv4.ip_forward=1",
        "nft --version",
        "nft delete table ip pathmesh",
        "nft -f -",
      ]);
      expect(runner.inputs[0]).toContain('ip saddr 11.0.0.0/8 oifname "eth9" masquerade');
    });

    it("falls back to iptables and detects the external interface", async () => {
      const { runner, fabric } = fabricWith(
        (command) => {
          if (command === "nft --version") return { exitCode: 127 };
          if (command === "ip route show default") return { stdout: "default via 10.1.0.1 dev wlan0 proto dhcp\n" };
          return undefined;
        },
        { subnet: "11.0.0.0/8" }
      );
      const result = await fabric.start();

      expect(result.isOk()).toBe(true);
      expect(runner.lines()).toContain("iptables -t nat -A POSTROUTING -s 11.0.0.0/8 -o wlan0 -j MASQUERADE");
    });

    it("fails when no external interface can be found", async () => {
      const { fabric } = fabricWith(undefined, { subnet: "11.0.0.0/8" });
      const result = await fabric.start();

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe("Could not detect external interface");
      }
    });

    it("reports the failing command", async () => {
      const { fabric } = fabricWith((command) =>
        command === "ip netns add pm-r2" ? { exitCode: 1, stderr: "Cannot create namespace file" } : undefined
      );
      const result = await fabric.start();

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.command).toBe("ip netns add pm-r2");
        expect(result.error.exitCode).toBe(1);
      }
    });
  });

  describe("stop", () => {
    it("removes only what start created, in reverse", async () => {
      const { runner, fabric } = fabricWith((command) =>
        command === "ip netns add pm-n1" ? { exitCode: 1 } : undefined
      );
      await fabric.start();
      runner.clear();

      const result = await fabric.stop();

      expect(result.isOk()).toBe(true);
      expect(runner.lines()).toEqual(["ip netns del pm-r2", "ip netns del pm-r1"]);
    });

    it("tears down bridges, namespaces and root links after a full start", async () => {
      const { runner, fabric } = fabricWith();
      await fabric.start();
      runner.clear();

      await fabric.stop();

      expect(runner.lines()).toEqual([
        "ovs-vsctl --if-exists del-br s3",
        "ovs-vsctl --if-exists del-br s2",
        "ovs-vsctl --if-exists del-br s1",
        "ovs-vsctl --if-exists del-br s0",
        "ip netns del pm-n1",
        "ip netns del pm-r2",
        "ip netns del pm-r1",
        "ip link del nat0-eth0",
      ]);
    });

    it("removes the NAT table", async () => {
      const { runner, fabric } = fabricWith(undefined, { subnet: "11.0.0.0/8", externalInterface: "eth9" });
      await fabric.start();
      runner.clear();

      await fabric.stop();

      expect(runner.lines().slice(0, 2)).toEqual(["nft --version", "nft delete table ip pathmesh"]);
    });

    it("reports a failed teardown command", async () => {
      const { fabric } = fabricWith((command) =>
        command === "ip netns del pm-r1" ? { exitCode: 1, stderr: "busy" } : undefined
      );
      await fabric.start();

      const result = await fabric.stop();

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.command).toBe("ip netns del pm-r1");
      }
    });
  });

  describe("handles", () => {
    it("runs node commands inside the node's namespace", async () => {
      const { runner, fabric } = fabricWith();

      await fabric.node("r2")?.runCommand("ip -br addr");
      await fabric.node("nat0")?.runCommand("hostname");
      await fabric.switch("s1")?.runCommand("ovs-ofctl dump-flows s1 -O OpenFlow13");

      expect(runner.calls).toEqual([
        ["ip", "netns", "exec", "pm-r2", "sh", "-c", "ip -br addr"],
        ["sh", "-c", "hostname"],
        ["sh", "-c", "ovs-ofctl dump-flows s1 -O OpenFlow13"],
      ]);
    });

    it("has no handle for unknown names", () => {
      const { fabric } = fabricWith();
      expect(fabric.node("n7")).toBeUndefined();
      expect(fabric.switch("s9")).toBeUndefined();
    });

    it("honours a custom namespace prefix", async () => {
      const runner = new RecordingRunner();
      const fabric = new LinuxFabric(topology, { runner, namespacePrefix: "lab-" });

      await fabric.node("n1")?.launch("iperf -s &");

      expect(runner.lines()).toEqual(["ip netns exec lab-n1 sh -c iperf -s &"]);
    });
  });

  describe("linkStates", () => {
    const listing = (states: Record<string, "UP" | "DOWN">) =>
      Object.entries(states)
        .map(
          ([name, state], i) =>
            `${i + 2}: ${name}@if${i + 10}: <BROADCAST,MULTICAST> mtu 1500 qdisc noqueue state ${state} mode DEFAULT group default qlen 1000\n    link/ether 02:00:00:00:00:0${i} brd ff:ff:ff:ff:ff:ff`
        )
        .join("\n");

    const allUp: Record<string, string> = {
      "pm-r1": listing({ "r1-eth0": "UP", "r1-eth1": "UP", "r1-eth2": "UP" }),
      "pm-r2": listing({ "r2-eth0": "UP", "r2-eth1": "UP" }),
      "pm-n1": listing({ "n1-eth0": "UP", "n1-eth1": "UP" }),
    };

    const answering = (namespaces: Record<string, string>, root = listing({ "nat0-eth0": "UP" })) =>
      fabricWith((command) => {
        if (!command.endsWith("ip -o link show")) return undefined;
        const namespace = Object.keys(namespaces).find((ns) => command.startsWith(`ip netns exec ${ns} `));
        return { stdout: namespace ? namespaces[namespace] : root };
      });

    it("asks every host once", async () => {
      const { runner, fabric } = answering(allUp);

      await fabric.linkStates();

      expect(runner.lines()).toEqual([
        "sh -c ip -o link show",
        "ip netns exec pm-r1 sh -c ip -o link show",
        "ip netns exec pm-r2 sh -c ip -o link show",
        "ip netns exec pm-n1 sh -c ip -o link show",
      ]);
    });

    it("is up when both ends are up", async () => {
      const { fabric } = answering(allUp);

      expect(Object.fromEntries(await fabric.linkStates())).toEqual({ l0: "up", l1: "up", l2: "up", l3: "up" });
    });

    it("is down when either end is down", async () => {
      const { fabric } = answering({ ...allUp, "pm-r1": listing({ "r1-eth0": "UP", "r1-eth1": "DOWN", "r1-eth2": "UP" }) });

      const states = await fabric.linkStates();

      expect(states.get("l1")).toBe("down");
      expect(states.get("l2")).toBe("up");
    });

    it("is down when the interface is missing", async () => {
      const { fabric } = fabricWith(() => ({ exitCode: 1, stderr: "Cannot open network namespace" }));

      expect((await fabric.linkStates()).get("l0")).toBe("down");
    });

    it("keeps one command in flight on large topologies", async () => {
      class CountingRunner extends RecordingRunner {
        inFlight = 0;
        peak = 0;

        override async run(argv: string[], options?: RunOptions) {
          this.inFlight++;
          this.peak = Math.max(this.peak, this.inFlight);
          try {
            await new Promise((resolve) => setTimeout(resolve, 0));
            return await super.run(argv, options);
          } finally {
            this.inFlight--;
          }
        }
      }
      const runner = new CountingRunner();
      const large = buildTopology({ nodes: 100, paths: 2 }).unwrap();
      const fabric = new LinuxFabric(large, { runner });

      const states = await fabric.linkStates();

      expect(states.size).toBe(large.links.length);
      expect(runner.calls).toHaveLength(100 + 3 + 1);
      expect(runner.peak).toBe(1);
    });
  });

  describe("interfacesUp", () => {
    it("reads interface names and skips ones that are not up", () => {
      const output = [
        "1: lo: <LOOPBACK,UP,LOWER_UP> mtu 65536 qdisc noqueue state UNKNOWN mode DEFAULT group default qlen 1000",
        "5: n1-eth0@if6: <BROADCAST,MULTICAST,UP,LOWER_UP> mtu 1500 qdisc noqueue state UP mode DEFAULT group default qlen 1000",
        "7: n1-eth1@if8: <BROADCAST,MULTICAST> mtu 1500 qdisc noop state DOWN mode DEFAULT group default qlen 1000",
        "9: s2: <BROADCAST,MULTICAST,UP,LOWER_UP> mtu 1500 qdisc noqueue state UP mode DEFAULT",
      ].join("\n");

      expect(interfacesUp(output)).toEqual(["n1-eth0", "s2"]);
    });
  });
});
