import { Result } from "better-result";
import {
  AlreadyRunningError,
  FabricError,
  InvalidParameterError,
  NodeNotFoundError,
  NotRunningError,
} from "@pathmesh/errors";
import type { Logger } from "@pathmesh/logger";
import { Mutex } from "@pathmesh/resilience";
import {
  buildTopology,
  findNode,
  firstOctet,
  hostsOf,
  type NodeDescriptor,
  type NodeKind,
  type TopologyDescriptor,
  type TopologyParams,
} from "@pathmesh/topology";
import {
  HandlerList,
  NodeConfigurator,
  gatewayRoutePlan,
  normalFlowCommand,
  type Fabric,
  type FabricFactory,
  type LinkState,
  type NodeHandle,
  type StreamingCommand,
  type SwitchHandle,
} from "@pathmesh/network";

export interface NodeSummary {
  name: string;
  type: NodeKind;
}

export interface LinkSummary {
  node1: string;
  intf1: string;
  ip1: string;
  node2: string;
  intf2: string;
  ip2: string;
  status: LinkState;
}

export type NetworkStatus =
  | { status: "stopped" }
  | {
      status: "running";
      nodes: NodeSummary[];
      links: LinkSummary[];
      node_count: number;
      link_count: number;
    };

export interface NetworkSnapshot {
  descriptor: TopologyDescriptor;
  links: LinkSummary[];
}

export type PingReport = Record<string, { ping: "Success" | "Failure" }>;

/**
 * State of a network that has been started. `configured` tracks nodes whose
 * configuration was attempted, so that stop only tears down those.
 */
export interface RunningNetwork {
  descriptor: TopologyDescriptor;
  fabric: Fabric;
  configured: Set<string>;
}

/**
 * Receiver of streamed command output
 */
export interface OutputSink {
  /** Rejects or throws once the receiver is gone */
  write(chunk: string): void | Promise<void>;
  /** Aborted when the receiver goes away between writes */
  signal?: AbortSignal;
}

/**
 * A streaming command holding the control-plane gate until it is run to
 * completion or cancelled
 */
export interface ExecSession {
  readonly node: string;
  readonly command: string;
  run(sink: OutputSink): Promise<Result<void, FabricError>>;
  cancel(): void;
}

export type ExecOutcome =
  | { mode: "background"; node: string }
  | { mode: "streaming"; session: ExecSession };

export interface ExecOptions {
  /** Stream output instead of dispatching in the background */
  streaming: boolean;
}

export type StartError = AlreadyRunningError | InvalidParameterError | FabricError;
export type NodeCommandError = NotRunningError | NodeNotFoundError | FabricError;

export interface ControlPlaneOptions {
  fabricFactory: FabricFactory;
  configurator?: NodeConfigurator;
  /** Raise host socket buffer limits on start (default: true) */
  tuneHostBuffers?: boolean;
  logger?: Logger;
}

export const TERMINAL_COMMAND = "xterm -ls -xrm 'XTerm*selectToClipboard: true'";

const PING_SUCCESS = "1 packets transmitted, 1 received";

/**
 * Host socket buffer limits for high-rate multicast. Numeric values are
 * only ever raised.
 */
export const HOST_BUFFER_SYSCTLS: ReadonlyArray<readonly [string, number | string]> = [
  ["net.core.wmem_max", 67108864],
  ["net.core.wmem_default", 67108864],
  ["net.core.rmem_max", 67108864],
  ["net.core.rmem_default", 67108864],
  ["net.ipv4.tcp_rmem", "20480 349520 67108864"],
  ["net.ipv4.tcp_wmem", "20480 349520 67108864"],
  ["net.core.netdev_max_backlog", 20000],
];

const notRunning = () => new NotRunningError({ message: "Network not running" });

async function checked(
  target: Pick<SwitchHandle, "name" | "runCommand">,
  command: string
): Promise<Result<string, FabricError>> {
  const result = await target.runCommand(command);
  if (result.isErr()) return Result.err(result.error);

  const { stdout, stderr, exitCode } = result.value;
  if (exitCode !== 0) {
    return Result.err(
      new FabricError({
        message: `Command failed on ${target.name} (exit ${exitCode}): ${command}${stderr.trim() ? `: ${stderr.trim()}` : ""}`,
        command,
        exitCode,
        stderr,
      })
    );
  }
  return Result.ok(stdout);
}

function handleOf(network: RunningNetwork, name: string): Result<NodeHandle, FabricError> {
  const handle = network.fabric.node(name);
  return handle
    ? Result.ok(handle)
    : Result.err(new FabricError({ message: `Fabric has no handle for node '${name}'` }));
}

function backgroundCommand(command: string): string {
  return command.trim().endsWith("&") ? command : `${command} &`;
}

class StreamingSession implements ExecSession {
  private finished = false;

  constructor(
    readonly node: string,
    readonly command: string,
    private readonly child: StreamingCommand,
    private readonly release: () => void,
    private readonly logger?: Logger
  ) {}

  async run(sink: OutputSink): Promise<Result<void, FabricError>> {
    if (this.finished) {
      return Result.err(new FabricError({ message: "Exec session already finished", command: this.command }));
    }

    const onAbort = () => {
      this.logger?.info("Output receiver went away, killing command", { node: this.node });
      this.child.kill();
    };
    sink.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      for await (const line of this.child.lines) {
        if (sink.signal?.aborted || !(await this.forward(sink, line))) {
          this.child.kill();
          return Result.ok(undefined);
        }
      }

      const stderr = await this.child.stderr;
      if (!sink.signal?.aborted && !(await this.forward(sink, stderr))) {
        this.child.kill();
      }

      const exitCode = await this.child.exited;
      this.logger?.debug("Streaming command exited", { node: this.node, exitCode });
      return Result.ok(undefined);
    } catch (error) {
      this.child.kill();
      return Result.err(
        new FabricError({
          message: `Streaming command failed on ${this.node}: ${error instanceof Error ? error.message : String(error)}`,
          command: this.command,
          cause: error,
        })
      );
    } finally {
      sink.signal?.removeEventListener("abort", onAbort);
      this.finish();
    }
  }

  cancel(): void {
    if (this.finished) return;
    this.child.kill();
    this.finish();
  }

  private async forward(sink: OutputSink, chunk: string): Promise<boolean> {
    // An empty chunk would terminate a chunked body
    if (chunk.length === 0) return true;

    const written = await Result.tryPromise({
      try: async () => {
        await sink.write(chunk);
      },
      catch: (error) => error,
    });
    if (written.isErr()) {
      this.logger?.warn("Output write failed", { node: this.node, error: String(written.error) });
      return false;
    }
    return true;
  }

  private finish(): void {
    this.finished = true;
    this.release();
  }
}

/**
 * Owns the lifecycle of the single emulated network.
 *
 * Every operation runs under one exclusive gate. A streaming exec keeps
 * the gate until its session has run or been cancelled.
 */
export class ControlPlane {
  /** Ordered bring-up steps run by `start` once the fabric exists */
  readonly bringUp: HandlerList<RunningNetwork>;

  private readonly gate = new Mutex();
  private readonly fabricFactory: FabricFactory;
  private readonly configurator: NodeConfigurator;
  private readonly logger?: Logger;
  private state: RunningNetwork | null = null;

  constructor(options: ControlPlaneOptions) {
    this.fabricFactory = options.fabricFactory;
    this.logger = options.logger;
    this.configurator = options.configurator ?? new NodeConfigurator({ logger: options.logger });

    this.bringUp = new HandlerList<RunningNetwork>().append("fabric", (network) => network.fabric.start());
    if (options.tuneHostBuffers ?? true) {
      this.bringUp.append("tune-host", (network) => this.tuneHost(network));
    }
    this.bringUp
      .append("configure-routers", (network) => this.configureAll(network, network.descriptor.routers))
      .append("configure-edges", (network) => this.configureAll(network, network.descriptor.edges))
      .append("cross-domain-routes", (network) => this.installCrossDomainRoutes(network))
      .append("switch-flows", (network) => this.installSwitchFlows(network));
  }

  isRunning(): boolean {
    return this.state !== null;
  }

  /**
   * Build the topology, create its fabric and run the bring-up steps.
   *
   * A failing step leaves the network running as far as it got; `stop`
   * tears it down.
   */
  start(params: TopologyParams): Promise<Result<TopologyDescriptor, StartError>> {
    return this.gate.runExclusive(async (): Promise<Result<TopologyDescriptor, StartError>> => {
      if (this.state) {
        return Result.err(new AlreadyRunningError({ message: "Network already running" }));
      }

      const built = buildTopology(params);
      if (built.isErr()) return Result.err(built.error);

      const descriptor = built.value;
      const network: RunningNetwork = {
        descriptor,
        fabric: this.fabricFactory.create(descriptor),
        configured: new Set(),
      };
      this.state = network;

      this.logger?.info("Starting network", { nodes: params.nodes, paths: params.paths });
      const result = await this.bringUp.run(network, (step) =>
        this.logger?.debug("Bring-up step", { step })
      );
      if (result.isErr()) {
        this.logger?.error("Network bring-up failed", { error: result.error.message });
        return Result.err(result.error);
      }

      this.logger?.info("Network started", {
        hosts: hostsOf(descriptor).length,
        links: descriptor.links.length,
      });
      return Result.ok(descriptor);
    });
  }

  /**
   * Tear down the running network. Stopping a stopped network succeeds;
   * the result tells whether anything was running.
   */
  stop(): Promise<Result<boolean, FabricError>> {
    return this.gate.runExclusive(() => this.teardown());
  }

  /**
   * Run a command on a node. A background command is dispatched and
   * forgotten; a streaming one comes back as a session that keeps the
   * gate until it is run or cancelled.
   */
  async exec(node: string, command: string, options: ExecOptions): Promise<Result<ExecOutcome, NodeCommandError>> {
    const release = await this.gate.acquire();
    let outcome: Result<ExecOutcome, NodeCommandError>;
    try {
      outcome = await this.dispatch(node, command, options, release);
    } catch (error) {
      release();
      throw error;
    }

    if (outcome.isErr() || outcome.value.mode === "background") {
      release();
    }
    return outcome;
  }

  listNodes(): Promise<Result<NodeSummary[], NotRunningError>> {
    return this.gate.runExclusive(async (): Promise<Result<NodeSummary[], NotRunningError>> =>
      this.state ? Result.ok(this.nodesOf(this.state)) : Result.err(notRunning())
    );
  }

  listLinks(): Promise<Result<LinkSummary[], NotRunningError>> {
    return this.gate.runExclusive(async (): Promise<Result<LinkSummary[], NotRunningError>> =>
      this.state ? Result.ok(await this.linksOf(this.state)) : Result.err(notRunning())
    );
  }

  status(): Promise<NetworkStatus> {
    return this.gate.runExclusive(async (): Promise<NetworkStatus> => {
      if (!this.state) return { status: "stopped" };

      const nodes = this.nodesOf(this.state);
      const links = await this.linksOf(this.state);
      return {
        status: "running",
        nodes,
        links,
        node_count: nodes.length,
        link_count: links.length,
      };
    });
  }

  /**
   * Ping every addressed interface of every other host. Pairs in
   * different first-octet domains are skipped unless one side is the
   * gateway host.
   */
  pingAll(): Promise<Result<PingReport, NotRunningError | FabricError>> {
    return this.gate.runExclusive(async (): Promise<Result<PingReport, NotRunningError | FabricError>> => {
      const network = this.state;
      if (!network) return Result.err(notRunning());

      const report: PingReport = {};
      const hosts = hostsOf(network.descriptor);

      for (const src of hosts) {
        const handle = handleOf(network, src.name);
        if (handle.isErr()) return Result.err(handle.error);

        for (const dst of hosts) {
          if (dst.name === src.name) continue;

          for (const srcIntf of src.interfaces) {
            for (const dstIntf of dst.interfaces) {
              const related =
                firstOctet(srcIntf.address) === firstOctet(dstIntf.address) ||
                src.kind === "gateway" ||
                dst.kind === "gateway";
              if (!related) continue;

              const result = await handle.value.runCommand(`ping -R -c 1 ${dstIntf.address}`);
              if (result.isErr()) return Result.err(result.error);

              const success = result.value.stdout.includes(PING_SUCCESS);
              const key = `${src.name}(${srcIntf.address}) -> ${dst.name}(${dstIntf.address})`;
              report[key] = { ping: success ? "Success" : "Failure" };
              this.logger?.debug("Ping", { from: src.name, to: dst.name, destination: dstIntf.address, success });
            }
          }
        }
      }

      return Result.ok(report);
    });
  }

  /**
   * Open an X terminal attached to a node
   */
  startTerminal(node: string): Promise<Result<void, NodeCommandError>> {
    return this.gate.runExclusive(async (): Promise<Result<void, NodeCommandError>> => {
      const target = this.resolve(node);
      if (target.isErr()) return Result.err(target.error);

      return target.value.handle.launch(backgroundCommand(TERMINAL_COMMAND));
    });
  }

  /**
   * Descriptor and live link states, for rendering
   */
  snapshot(): Promise<Result<NetworkSnapshot, NotRunningError>> {
    return this.gate.runExclusive(async (): Promise<Result<NetworkSnapshot, NotRunningError>> => {
      if (!this.state) return Result.err(notRunning());
      return Result.ok({ descriptor: this.state.descriptor, links: await this.linksOf(this.state) });
    });
  }

  /**
   * Stop the network on process exit
   */
  async shutdown(): Promise<void> {
    const result = await this.stop();
    if (result.isErr()) {
      this.logger?.error("Failed to stop network on shutdown", { error: result.error.message });
    }
  }

  private async teardown(): Promise<Result<boolean, FabricError>> {
    const network = this.state;
    if (!network) {
      this.logger?.debug("Stop requested while stopped");
      return Result.ok(false);
    }

    this.logger?.info("Stopping network");
    for (const node of hostsOf(network.descriptor)) {
      if (!network.configured.has(node.name)) continue;

      const handle = handleOf(network, node.name);
      const terminated = handle.isOk()
        ? await this.configurator.terminate(handle.value, node)
        : Result.err(handle.error);
      if (terminated.isErr()) {
        this.logger?.warn("Node teardown incomplete", { node: node.name, error: terminated.error.message });
      }
    }

    const stopped = await network.fabric.stop();
    this.state = null;

    if (stopped.isErr()) {
      this.logger?.error("Fabric teardown failed", { error: stopped.error.message });
      return Result.err(stopped.error);
    }

    this.logger?.info("Network stopped");
    return Result.ok(true);
  }

  private resolve(name: string): Result<{ node: NodeDescriptor; handle: NodeHandle }, NodeCommandError> {
    const network = this.state;
    if (!network) return Result.err(notRunning());

    const node = findNode(network.descriptor, name);
    if (!node) {
      return Result.err(new NodeNotFoundError({ message: `Node '${name}' not found`, node: name }));
    }

    const handle = handleOf(network, name);
    if (handle.isErr()) return Result.err(handle.error);
    return Result.ok({ node, handle: handle.value });
  }

  private async dispatch(
    name: string,
    command: string,
    options: ExecOptions,
    release: () => void
  ): Promise<Result<ExecOutcome, NodeCommandError>> {
    const target = this.resolve(name);
    if (target.isErr()) return Result.err(target.error);

    const { handle } = target.value;
    this.logger?.info("Executing command", { node: name, command, streaming: options.streaming });

    if (!options.streaming) {
      const launched = await handle.launch(backgroundCommand(command));
      if (launched.isErr()) return Result.err(launched.error);
      return Result.ok({ mode: "background", node: name });
    }

    const started = handle.stream(command);
    if (started.isErr()) return Result.err(started.error);

    return Result.ok({
      mode: "streaming",
      session: new StreamingSession(name, command, started.value, release, this.logger),
    });
  }

  private nodesOf(network: RunningNetwork): NodeSummary[] {
    return hostsOf(network.descriptor).map((node) => ({ name: node.name, type: node.kind }));
  }

  private async linksOf(network: RunningNetwork): Promise<LinkSummary[]> {
    const states = await network.fabric.linkStates();
    return network.descriptor.links.map((link) => ({
      node1: link.a.node,
      intf1: link.a.interface,
      ip1: link.a.address,
      node2: link.b.node,
      intf2: link.b.interface,
      ip2: link.b.address,
      status: states.get(link.id) ?? "down",
    }));
  }

  private async configureAll(network: RunningNetwork, nodes: NodeDescriptor[]): Promise<Result<void, FabricError>> {
    for (const node of nodes) {
      const handle = handleOf(network, node.name);
      if (handle.isErr()) return Result.err(handle.error);

      network.configured.add(node.name);
      const result = await this.configurator.configure(handle.value, node, network.descriptor);
      if (result.isErr()) return result;
    }
    return Result.ok(undefined);
  }

  private async installCrossDomainRoutes(network: RunningNetwork): Promise<Result<void, FabricError>> {
    for (const { node, plan } of gatewayRoutePlan(network.descriptor)) {
      const handle = handleOf(network, node);
      if (handle.isErr()) return Result.err(handle.error);

      const result = await this.configurator.apply(handle.value, plan);
      if (result.isErr()) return result;
    }
    return Result.ok(undefined);
  }

  private async installSwitchFlows(network: RunningNetwork): Promise<Result<void, FabricError>> {
    for (const { name } of network.descriptor.switches) {
      const handle = network.fabric.switch(name);
      if (!handle) {
        return Result.err(new FabricError({ message: `Fabric has no handle for switch '${name}'` }));
      }

      const result = await checked(handle, normalFlowCommand(name));
      if (result.isErr()) return Result.err(result.error);
    }
    return Result.ok(undefined);
  }

  /**
   * Test-and-set the host buffer sysctls through the gateway host, which
   * lives in the root namespace
   */
  private async tuneHost(network: RunningNetwork): Promise<Result<void, FabricError>> {
    const handle = handleOf(network, network.descriptor.gateway.name);
    if (handle.isErr()) return Result.err(handle.error);

    for (const [key, value] of HOST_BUFFER_SYSCTLS) {
      const current = await checked(handle.value, `sysctl -n ${key}`);
      if (current.isErr()) return Result.err(current.error);

      const observed = current.value.trim().split(/\s+/).join(" ");
      const needsUpdate = typeof value === "number" ? Number(observed) < value : observed !== value;
      if (!needsUpdate) continue;

      const set = await checked(handle.value, `sysctl -w ${key}="${value}"`);
      if (set.isErr()) return Result.err(set.error);
      this.logger?.debug("Raised host sysctl", { key, from: observed, to: value });
    }
    return Result.ok(undefined);
  }
}
