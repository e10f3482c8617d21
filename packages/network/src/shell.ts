/**
 * Process execution
 *
 * Thin wrapper over child_process used by the Linux fabric and the
 * renderer. Every call takes an argv array; shell interpretation only
 * happens where the caller spells out `sh -c`.
 */

import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import { Result } from "better-result";
import { FabricError } from "@pathmesh/errors";

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * A running command whose stdout is consumed line by line
 */
export interface StreamingCommand {
  /** Stdout lines, each with its trailing newline */
  lines: AsyncIterable<string>;
  /** All of stderr, resolved once the process has exited */
  stderr: Promise<string>;
  exited: Promise<number>;
  /** Signal the whole process group */
  kill(): void;
}

export interface RunOptions {
  /** Written to stdin, which is then closed */
  input?: string;
}

export interface CommandRunner {
  run(argv: string[], options?: RunOptions): Promise<Result<CommandResult, FabricError>>;
  /** Raw stdout bytes; a nonzero exit is an error */
  output(argv: string[], options?: RunOptions): Promise<Result<Buffer, FabricError>>;
  /** Start detached with stdio ignored; resolves once the process exists */
  launch(argv: string[]): Promise<Result<void, FabricError>>;
  stream(argv: string[]): Result<StreamingCommand, FabricError>;
}

const commandLine = (argv: string[]) => argv.join(" ");

function spawnFailure(argv: string[], error: unknown): FabricError {
  return new FabricError({
    message: `Failed to spawn ${argv[0]}: ${error instanceof Error ? error.message : String(error)}`,
    command: commandLine(argv),
    cause: error,
  });
}

function collect(argv: string[], options: RunOptions) {
  return new Promise<Result<{ stdout: Buffer; stderr: string; exitCode: number }, FabricError>>(
    (resolve) => {
      const proc = spawn(argv[0], argv.slice(1), { stdio: ["pipe", "pipe", "pipe"] });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      proc.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      proc.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
      proc.on("error", (error) => resolve(Result.err(spawnFailure(argv, error))));
      proc.on("close", (code, signal) => {
        resolve(
          Result.ok({
            stdout: Buffer.concat(stdout),
            stderr: Buffer.concat(stderr).toString("utf8"),
            exitCode: code ?? (signal ? 128 : 1),
          })
        );
      });

      // A process that exits before reading its input closes the pipe early
      proc.stdin.on("error", () => proc.stdin.destroy());
      proc.stdin.end(options.input ?? "");
    }
  );
}

async function* linesOf(input: NodeJS.ReadableStream): AsyncGenerator<string> {
  const reader = createInterface({ input, crlfDelay: Infinity });
  for await (const line of reader) {
    yield `${line}\n`;
  }
}

export function createShellRunner(): CommandRunner {
  return {
    async run(argv, options = {}) {
      const result = await collect(argv, options);
      if (result.isErr()) return Result.err(result.error);

      const { stdout, stderr, exitCode } = result.value;
      return Result.ok({ stdout: stdout.toString("utf8"), stderr, exitCode });
    },

    async output(argv, options = {}) {
      const result = await collect(argv, options);
      if (result.isErr()) return Result.err(result.error);

      const { stdout, stderr, exitCode } = result.value;
      if (exitCode !== 0) {
        return Result.err(
          new FabricError({
            message: `Command failed: ${commandLine(argv)}: ${stderr.trim()}`,
            command: commandLine(argv),
            exitCode,
            stderr,
          })
        );
      }
      return Result.ok(stdout);
    },

    launch(argv) {
      return new Promise((resolve) => {
        const proc = spawn(argv[0], argv.slice(1), { detached: true, stdio: "ignore" });
        proc.on("error", (error) => resolve(Result.err(spawnFailure(argv, error))));
        proc.on("spawn", () => {
          proc.unref();
          resolve(Result.ok(undefined));
        });
      });
    },

    stream(argv) {
      return Result.try({
        try: () => {
          const proc = spawn(argv[0], argv.slice(1), {
            detached: true,
            stdio: ["ignore", "pipe", "pipe"],
          });

          const exited = new Promise<number>((resolve) => {
            proc.on("error", () => resolve(127));
            proc.on("close", (code, signal) => resolve(code ?? (signal ? 128 : 1)));
          });

          const chunks: Buffer[] = [];
          proc.stderr.on("data", (chunk: Buffer) => chunks.push(chunk));
          const stderr = exited.then(() => Buffer.concat(chunks).toString("utf8"));

          return {
            lines: linesOf(proc.stdout),
            stderr,
            exited,
            kill: () => {
              if (proc.exitCode !== null || proc.signalCode !== null || proc.pid === undefined) {
                return;
              }
              try {
                process.kill(-proc.pid, "SIGTERM");
              } catch {
                proc.kill("SIGTERM");
              }
            },
          };
        },
        catch: (error) => spawnFailure(argv, error),
      });
    },
  };
}

/**
 * Run a command and treat a nonzero exit as an error
 */
export async function runChecked(
  runner: CommandRunner,
  argv: string[],
  options: RunOptions = {}
): Promise<Result<CommandResult, FabricError>> {
  const result = await runner.run(argv, options);
  if (result.isErr()) return result;

  const { exitCode, stderr } = result.value;
  if (exitCode !== 0) {
    return Result.err(
      new FabricError({
        message: `Command failed: ${commandLine(argv)}${stderr.trim() ? `: ${stderr.trim()}` : ""}`,
        command: commandLine(argv),
        exitCode,
        stderr,
      })
    );
  }
  return result;
}
