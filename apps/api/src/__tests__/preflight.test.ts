import { describe, it, expect } from "vitest";
import { Result } from "better-result";
import type { FabricError } from "@pathmesh/errors";
import type { CommandResult, CommandRunner } from "@pathmesh/network";
import { preflight } from "../preflight";

function runnerWith(installed: string[]) {
  const calls: string[][] = [];
  const runner: CommandRunner = {
    async run(argv): Promise<Result<CommandResult, FabricError>> {
      calls.push(argv);
      const exitCode = installed.includes(argv[argv.length - 1] ?? "") ? 0 : 1;
      return Result.ok({ stdout: "", stderr: "", exitCode });
    },
    async output() {
      return Result.ok(Buffer.alloc(0));
    },
    async launch() {
      return Result.ok(undefined);
    },
    stream() {
      throw new Error("not used");
    },
  };
  return { runner, calls };
}

const binaries = { relayDaemon: "smcrouted", relayControl: "smcroutectl" };

describe("preflight", () => {
  it("passes as root with the relay installed", async () => {
    const { runner, calls } = runnerWith(["smcrouted", "smcroutectl"]);

    const result = await preflight({ runner, ...binaries, uid: 0 });

    expect(result.isOk()).toBe(true);
    expect(calls).toEqual([
      ["which", "smcrouted"],
      ["which", "smcroutectl"],
    ]);
  });

  it("fails without root privileges", async () => {
    const { runner, calls } = runnerWith(["smcrouted", "smcroutectl"]);

    const result = await preflight({ runner, ...binaries, uid: 1000 });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe("This process needs to run with root privileges");
    }
    expect(calls).toEqual([]);
  });

  it("fails when the relay daemon binary is missing", async () => {
    const { runner, calls } = runnerWith(["smcroutectl"]);

    const result = await preflight({ runner, ...binaries, uid: 0 });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe("smcrouted not found on PATH; install smcroute first");
    }
    expect(calls).toEqual([["which", "smcrouted"]]);
  });

  it("fails when the relay control binary is missing", async () => {
    const { runner } = runnerWith(["smcrouted"]);

    const result = await preflight({ runner, ...binaries, uid: 0 });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe("smcroutectl not found on PATH; install smcroute first");
    }
  });
});
