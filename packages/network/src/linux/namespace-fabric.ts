/**
 * Linux emulation fabric
 *
 * Routers and edge nodes get their own network namespace; the gateway host
 * stays in the root namespace. Every link is a pair of veths patched into
 * a two-port Open vSwitch bridge.
 */

import { Result } from "better-result";
import { FabricError } from "@pathmesh/errors";
import type { Logger } from "@pathmesh/logger";
import { hostsOf } from "@pathmesh/topology";
import type { LinkEndpoint, NodeDescriptor, NodeKind, TopologyDescriptor } from "@pathmesh/topology";
import {
  HandlerList,
  type Fabric,
  type FabricFactory,
  type LinkState,
  type NodeHandle,
  type SwitchHandle,
} from "../fabric";
import { runChecked, type CommandResult, type CommandRunner, type StreamingCommand } from "../shell";
import { addBridge, addPort, deleteBridge } from "./ovs";
import { NATManager, type NATConfig } from "./nat";

export const DEFAULT_NAMESPACE_PREFIX = "pm-";

export interface LinuxFabricOptions {
  runner: CommandRunner;
  /** Prepended to node names to form namespace names (default: "pm-") */
  namespacePrefix?: string;
  /** Masquerade settings for the gateway host; false disables NAT */
  nat?: { subnet: string; externalInterface?: string } | false;
  logger?: Logger;
}

function inNamespace(namespace: string | null, argv: string[]): string[] {
  return namespace === null ? argv : ["ip", "netns", "exec", namespace, ...argv];
}

export class LinuxNodeHandle implements NodeHandle {
  constructor(
    readonly name: string,
    readonly kind: NodeKind,
    /** Null for nodes living in the root namespace */
    readonly namespace: string | null,
    private readonly runner: CommandRunner
  ) {}

  argv(command: string): string[] {
    return inNamespace(this.namespace, ["sh", "-c", command]);
  }

  runCommand(command: string): Promise<Result<CommandResult, FabricError>> {
    return this.runner.run(this.argv(command));
  }

  launch(command: string): Promise<Result<void, FabricError>> {
    return this.runner.launch(this.argv(command));
  }

  stream(command: string): Result<StreamingCommand, FabricError> {
    return this.runner.stream(this.argv(command));
  }
}

class OvsSwitchHandle implements SwitchHandle {
  constructor(
    readonly name: string,
    private readonly runner: CommandRunner
  ) {}

  runCommand(command: string): Promise<Result<CommandResult, FabricError>> {
    return this.runner.run(["sh", "-c", command]);
  }
}

type Step = Promise<Result<void, FabricError>>;

// `ip -o link show` prints one interface per line: "5: n1-eth1@if6: <...> ... state UP ..."
const LINK_LINE = /^\d+:\s+([^:@\s]+)(?:@\S+)?:.*\bstate (\S+)/;

export function interfacesUp(output: string): string[] {
  return output.split("\n").flatMap((line) => {
    const match = LINK_LINE.exec(line);
    return match && match[2] === "UP" ? [match[1]] : [];
  });
}

export class LinuxFabric implements Fabric {
  private readonly runner: CommandRunner;
  private readonly prefix: string;
  private readonly logger?: Logger;
  private readonly natManager: NATManager;
  private readonly nodes = new Map<string, LinuxNodeHandle>();
  private readonly switches = new Map<string, OvsSwitchHandle>();

  // What start() managed to create, torn down in reverse by stop()
  private createdNamespaces: string[] = [];
  private createdBridges: string[] = [];
  private createdRootLinks: string[] = [];
  private natConfig: NATConfig | null = null;

  constructor(
    readonly descriptor: TopologyDescriptor,
    private readonly options: LinuxFabricOptions
  ) {
    this.runner = options.runner;
    this.prefix = options.namespacePrefix ?? DEFAULT_NAMESPACE_PREFIX;
    this.logger = options.logger;
    this.natManager = new NATManager(this.runner);

    for (const node of hostsOf(descriptor)) {
      this.nodes.set(node.name, new LinuxNodeHandle(node.name, node.kind, this.namespaceOf(node), this.runner));
    }
    for (const sw of descriptor.switches) {
      this.switches.set(sw.name, new OvsSwitchHandle(sw.name, this.runner));
    }
  }

  namespaceOf(node: NodeDescriptor): string | null {
    return node.kind === "gateway" ? null : `${this.prefix}${node.name}`;
  }

  node(name: string): NodeHandle | undefined {
    return this.nodes.get(name);
  }

  switch(name: string): SwitchHandle | undefined {
    return this.switches.get(name);
  }

  async start(): Promise<Result<void, FabricError>> {
    await this.clearLeftovers();

    return new HandlerList<LinuxFabric>()
      .append("namespaces", () => this.createNamespaces())
      .append("switches", () => this.createSwitches())
      .append("links", () => this.createLinks())
      .append("nat", () => this.enableNAT())
      .run(this, (step) => this.logger?.debug("Fabric step", { step }));
  }

  async stop(): Promise<Result<void, FabricError>> {
    let firstFailure: FabricError | undefined;
    const attempt = async (argv: string[]) => {
      const result = await runChecked(this.runner, argv);
      if (result.isErr()) {
        this.logger?.warn("Fabric teardown command failed", { command: argv.join(" "), error: result.error.message });
        firstFailure ??= result.error;
      }
    };

    if (this.natConfig) {
      const removed = await this.natManager.remove(this.natConfig);
      if (removed.isErr()) {
        this.logger?.warn("Failed to remove NAT rules", { error: removed.error.message });
      }
      this.natConfig = null;
    }

    for (const bridge of [...this.createdBridges].reverse()) {
      await attempt(deleteBridge(bridge));
    }
    for (const namespace of [...this.createdNamespaces].reverse()) {
      await attempt(["ip", "netns", "del", namespace]);
    }
    for (const link of [...this.createdRootLinks].reverse()) {
      await attempt(["ip", "link", "del", link]);
    }

    this.createdBridges = [];
    this.createdNamespaces = [];
    this.createdRootLinks = [];

    return firstFailure ? Result.err(firstFailure) : Result.ok(undefined);
  }

  /**
   * State of every link, keyed by link id. A link is up when both of its
   * interfaces report state UP. Each host is asked once, one at a time.
   */
  async linkStates(): Promise<Map<string, LinkState>> {
    const up = new Set<string>();
    for (const handle of this.nodes.values()) {
      const result = await handle.runCommand("ip -o link show");
      if (result.isErr() || result.value.exitCode !== 0) {
        this.logger?.debug("Could not read interface states", { node: handle.name });
        continue;
      }
      for (const name of interfacesUp(result.value.stdout)) {
        up.add(`${handle.name}/${name}`);
      }
    }

    const isUp = (end: LinkEndpoint) => up.has(`${end.node}/${end.interface}`);
    return new Map(
      this.descriptor.links.map((link): [string, LinkState] => [link.id, isUp(link.a) && isUp(link.b) ? "up" : "down"])
    );
  }

  // Remove anything of the same names a previous run left behind
  private async clearLeftovers(): Promise<void> {
    const commands: string[][] = [
      ...this.descriptor.switches.map((sw) => deleteBridge(sw.name)),
      ...hostsOf(this.descriptor).flatMap((node) => {
        const namespace = this.namespaceOf(node);
        return namespace === null
          ? node.interfaces.map((intf) => ["ip", "link", "del", intf.name])
          : [["ip", "netns", "del", namespace]];
      }),
    ];

    for (const argv of commands) {
      const result = await runChecked(this.runner, argv);
      if (result.isErr()) {
        this.logger?.debug("Nothing to clear", { command: argv.join(" ") });
      }
    }
  }

  private async checkAll(commands: string[][]): Step {
    for (const argv of commands) {
      const result = await runChecked(this.runner, argv);
      if (result.isErr()) return Result.err(result.error);
    }
    return Result.ok(undefined);
  }

  private async createNamespaces(): Step {
    for (const node of hostsOf(this.descriptor)) {
      const namespace = this.namespaceOf(node);
      if (namespace === null) continue;

      const added = await runChecked(this.runner, ["ip", "netns", "add", namespace]);
      if (added.isErr()) return Result.err(added.error);
      this.createdNamespaces.push(namespace);

      const lo = await this.checkAll([inNamespace(namespace, ["ip", "link", "set", "lo", "up"])]);
      if (lo.isErr()) return lo;
    }
    return Result.ok(undefined);
  }

  private async createSwitches(): Step {
    for (const sw of this.descriptor.switches) {
      const added = await runChecked(this.runner, addBridge(sw.name));
      if (added.isErr()) return Result.err(added.error);
      this.createdBridges.push(sw.name);

      const up = await this.checkAll([["ip", "link", "set", sw.name, "up"]]);
      if (up.isErr()) return up;
    }
    return Result.ok(undefined);
  }

  private async createLinks(): Step {
    for (const link of this.descriptor.links) {
      for (const end of [link.a, link.b]) {
        const result = await this.attach(link.switch, end);
        if (result.isErr()) return result;
      }
    }
    return Result.ok(undefined);
  }

  /**
   * Veth between the node interface and its switch port, addressed /24
   */
  private async attach(bridge: string, end: LinkEndpoint): Step {
    const handle = this.nodes.get(end.node);
    if (!handle) {
      return Result.err(new FabricError({ message: `Unknown node ${end.node} on ${bridge}` }));
    }
    const namespace = handle.namespace;

    const created = await runChecked(this.runner, [
      "ip", "link", "add", end.interface, "type", "veth", "peer", "name", end.port,
    ]);
    if (created.isErr()) return Result.err(created.error);
    if (namespace === null) this.createdRootLinks.push(end.interface);

    return this.checkAll([
      ...(namespace === null ? [] : [["ip", "link", "set", end.interface, "netns", namespace]]),
      inNamespace(namespace, ["ip", "addr", "add", `${end.address}/24`, "dev", end.interface]),
      inNamespace(namespace, ["ip", "link", "set", end.interface, "up"]),
      addPort(bridge, end.port),
      ["ip", "link", "set", end.port, "up"],
    ]);
  }

  private async enableNAT(): Step {
    const nat = this.options.nat;
    if (nat === false || nat === undefined) return Result.ok(undefined);

    const externalInterface = nat.externalInterface ?? (await this.natManager.detectExternalInterface());
    if (!externalInterface) {
      return Result.err(new FabricError({ message: "Could not detect external interface" }));
    }

    const config: NATConfig = { subnet: nat.subnet, externalInterface };
    const applied = await this.natManager.apply(config);
    if (applied.isErr()) return applied;

    this.natConfig = config;
    this.logger?.info("NAT enabled", { subnet: nat.subnet, externalInterface });
    return Result.ok(undefined);
  }
}

/**
 * Creates Linux fabrics sharing one set of options
 */
export class LinuxFabricFactory implements FabricFactory<LinuxFabric> {
  constructor(private readonly options: LinuxFabricOptions) {}

  create(descriptor: TopologyDescriptor): LinuxFabric {
    return new LinuxFabric(descriptor, this.options);
  }
}
