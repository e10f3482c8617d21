import { Result } from "better-result";
import type { FabricError } from "@pathmesh/errors";
import type { NodeKind, TopologyDescriptor } from "@pathmesh/topology";
import type { CommandResult, StreamingCommand } from "./shell";

/**
 * @pathmesh/network fabric
 *
 * The emulation fabric provides nodes, switches and links for a
 * descriptor and runs commands inside nodes.
 */

export type LinkState = "up" | "down";

/**
 * Capability to act inside one emulated node
 */
export interface NodeHandle {
  readonly name: string;
  readonly kind: NodeKind;

  /**
   * Run a command to completion. A nonzero exit is reported through
   * `exitCode`; only a failure to spawn is an error.
   */
  runCommand(command: string): Promise<Result<CommandResult, FabricError>>;

  /**
   * Dispatch a command and return without waiting for it
   */
  launch(command: string): Promise<Result<void, FabricError>>;

  /**
   * Start a command whose output is read as it is produced
   */
  stream(command: string): Result<StreamingCommand, FabricError>;
}

export interface SwitchHandle {
  readonly name: string;
  runCommand(command: string): Promise<Result<CommandResult, FabricError>>;
}

/**
 * One live instance of an emulated topology
 */
export interface Fabric {
  readonly descriptor: TopologyDescriptor;

  start(): Promise<Result<void, FabricError>>;
  stop(): Promise<Result<void, FabricError>>;

  node(name: string): NodeHandle | undefined;
  switch(name: string): SwitchHandle | undefined;

  /** State of every link of the descriptor, keyed by link id */
  linkStates(): Promise<Map<string, LinkState>>;
}

/**
 * Factory interface for creating fabric instances
 */
export interface FabricFactory<TFabric extends Fabric = Fabric> {
  create(descriptor: TopologyDescriptor): TFabric;
}

/**
 * Handler function type for ordered bring-up steps
 */
export type StepHandler<T, E = FabricError> = (target: T) => Promise<Result<void, E>>;

/**
 * Handler list for managing ordered handler chains.
 * `run` stops at the first failing handler.
 */
export class HandlerList<T, E = FabricError> {
  private handlers: Map<string, StepHandler<T, E>> = new Map();
  private order: string[] = [];

  append(name: string, handler: StepHandler<T, E>): this {
    if (!this.handlers.has(name)) {
      this.order.push(name);
    }
    this.handlers.set(name, handler);
    return this;
  }

  async run(target: T, onStep?: (name: string) => void): Promise<Result<void, E>> {
    for (const name of this.order) {
      const handler = this.handlers.get(name);
      if (handler) {
        onStep?.(name);
        const result = await handler(target);
        if (result.isErr()) {
          return result;
        }
      }
    }
    return Result.ok(undefined);
  }
}
