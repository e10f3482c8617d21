import { Result } from "better-result";
import { FabricError } from "@pathmesh/errors";
import type { Logger } from "@pathmesh/logger";
import { withRetry, type RetryOptions } from "@pathmesh/resilience";
import type { NodeDescriptor, TopologyDescriptor } from "@pathmesh/topology";
import type { NodeHandle } from "../fabric";
import type { CommandResult } from "../shell";
import type { ConfigAction, ConfigPlan } from "./plan";
import { DEFAULT_RELAY, RelayDaemon, type RelayBinaries } from "./relay";
import { routerPlan, routerTeardownPlan } from "./router";
import { edgePlan, edgeTeardownPlan } from "./edge";

export interface NodeConfiguratorOptions {
  relay?: RelayBinaries;
  /** Backoff for readiness probes */
  readiness?: Partial<RetryOptions>;
  logger?: Logger;
}

/**
 * Derives and applies per-node configuration.
 *
 * Planning is pure; `configure` and `terminate` are the only methods that
 * touch a node, and only through its `NodeHandle`.
 */
export class NodeConfigurator {
  private readonly relay: RelayBinaries;
  private readonly readiness: Partial<RetryOptions>;
  private readonly logger?: Logger;

  constructor(options: NodeConfiguratorOptions = {}) {
    this.relay = options.relay ?? DEFAULT_RELAY;
    this.readiness = options.readiness ?? {};
    this.logger = options.logger;
  }

  /**
   * Configuration plan for a node. The gateway host has none; its routes
   * come with the cross-domain plan.
   */
  plan(node: NodeDescriptor, descriptor: TopologyDescriptor): ConfigPlan {
    const relay = new RelayDaemon(node.name, this.relay);
    switch (node.kind) {
      case "router":
        return routerPlan(node, relay);
      case "edge":
        return edgePlan(node, descriptor.params.nodes, relay);
      case "gateway":
        return [];
    }
  }

  teardownPlan(node: NodeDescriptor): ConfigPlan {
    const relay = new RelayDaemon(node.name, this.relay);
    switch (node.kind) {
      case "router":
        return routerTeardownPlan(node, relay);
      case "edge":
        return edgeTeardownPlan(relay);
      case "gateway":
        return [];
    }
  }

  async configure(
    handle: NodeHandle,
    node: NodeDescriptor,
    descriptor: TopologyDescriptor
  ): Promise<Result<void, FabricError>> {
    const plan = this.plan(node, descriptor);
    this.logger?.info("Configuring node", { node: node.name, kind: node.kind, actions: plan.length });
    return this.apply(handle, plan);
  }

  /**
   * Apply the teardown plan, continuing past failures. The first failure
   * is returned once every action has been tried.
   */
  async terminate(handle: NodeHandle, node: NodeDescriptor): Promise<Result<void, FabricError>> {
    let firstFailure: FabricError | undefined;

    for (const action of this.teardownPlan(node)) {
      const result = await this.runOnce(handle, action.command);
      if (result.isErr()) {
        this.logger?.warn("Teardown command failed", {
          node: handle.name,
          command: action.command,
          error: result.error.message,
        });
        firstFailure ??= result.error;
      }
    }

    return firstFailure ? Result.err(firstFailure) : Result.ok(undefined);
  }

  /**
   * Run a plan in order, stopping at the first failing action
   */
  async apply(handle: NodeHandle, plan: ConfigPlan): Promise<Result<void, FabricError>> {
    for (const action of plan) {
      const result = await this.execute(handle, action);
      if (result.isErr()) {
        this.logger?.error("Configuration command failed", {
          node: handle.name,
          command: action.command,
          exitCode: result.error.exitCode,
          stderr: result.error.stderr,
        });
        return Result.err(result.error);
      }
    }
    return Result.ok(undefined);
  }

  private execute(handle: NodeHandle, action: ConfigAction): Promise<Result<CommandResult, FabricError>> {
    if (action.kind === "run") {
      return this.runOnce(handle, action.command);
    }

    return withRetry(() => this.runOnce(handle, action.command), {
      ...this.readiness,
      onRetry: (attempt, delayMs) =>
        this.logger?.debug("Waiting for readiness", {
          node: handle.name,
          command: action.command,
          attempt,
          delayMs,
        }),
    });
  }

  private async runOnce(handle: NodeHandle, command: string): Promise<Result<CommandResult, FabricError>> {
    const result = await handle.runCommand(command);
    if (result.isErr()) return result;

    const { exitCode, stderr } = result.value;
    if (exitCode !== 0) {
      return Result.err(
        new FabricError({
          message: `Command failed on ${handle.name} (exit ${exitCode}): ${command}${stderr.trim() ? `: ${stderr.trim()}` : ""}`,
          command,
          exitCode,
          stderr,
        })
      );
    }
    return result;
  }
}
