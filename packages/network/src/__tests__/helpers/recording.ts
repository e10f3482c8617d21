import { Result } from "better-result";
import { FabricError } from "@pathmesh/errors";
import type { NodeKind } from "@pathmesh/topology";
import type { NodeHandle } from "../../fabric";
import type { CommandResult, CommandRunner, RunOptions, StreamingCommand } from "../../shell";

export type Responder = (command: string) => Partial<CommandResult> | undefined;

function complete(reply: Partial<CommandResult> | undefined): CommandResult {
  return { stdout: reply?.stdout ?? "", stderr: reply?.stderr ?? "", exitCode: reply?.exitCode ?? 0 };
}

/**
 * Node handle that records every command and answers from a responder
 */
export class RecordingHandle implements NodeHandle {
  readonly commands: string[] = [];
  readonly launched: string[] = [];

  constructor(
    readonly name: string,
    readonly kind: NodeKind = "router",
    private readonly respond: Responder = () => undefined
  ) {}

  async runCommand(command: string): Promise<Result<CommandResult, FabricError>> {
    this.commands.push(command);
    return Result.ok(complete(this.respond(command)));
  }

  async launch(command: string): Promise<Result<void, FabricError>> {
    this.launched.push(command);
    return Result.ok(undefined);
  }

  stream(command: string): Result<StreamingCommand, FabricError> {
    return Result.err(new FabricError({ message: `streaming not recorded: ${command}` }));
  }
}

/**
 * Command runner that records argv arrays instead of spawning
 */
export class RecordingRunner implements CommandRunner {
  calls: string[][] = [];
  inputs: string[] = [];

  constructor(private readonly respond: Responder = () => undefined) {}

  lines(): string[] {
    return this.calls.map((argv) => argv.join(" "));
  }

  clear(): void {
    this.calls = [];
    this.inputs = [];
  }

  async run(argv: string[], options: RunOptions = {}): Promise<Result<CommandResult, FabricError>> {
    this.calls.push(argv);
    if (options.input !== undefined) this.inputs.push(options.input);
    return Result.ok(complete(this.respond(argv.join(" "))));
  }

  async output(argv: string[], options: RunOptions = {}): Promise<Result<Buffer, FabricError>> {
    const result = await this.run(argv, options);
    if (result.isErr()) return Result.err(result.error);
    return Result.ok(Buffer.from(result.value.stdout));
  }

  async launch(argv: string[]): Promise<Result<void, FabricError>> {
    this.calls.push(argv);
    return Result.ok(undefined);
  }

  stream(argv: string[]): Result<StreamingCommand, FabricError> {
    this.calls.push(argv);
    return Result.err(new FabricError({ message: "streaming not recorded" }));
  }
}
