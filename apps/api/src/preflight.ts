import { Result } from "better-result";
import { ValidationError } from "@pathmesh/errors";
import type { CommandRunner } from "@pathmesh/network";

export interface PreflightOptions {
  runner: CommandRunner;
  /** Relay daemon binary that must be on PATH */
  relayDaemon: string;
  /** Relay control binary that must be on PATH */
  relayControl: string;
  /** Effective user id, when the platform has one */
  uid?: number;
}

/**
 * Startup checks that make a running server useless when they fail:
 * root privileges and the relay binaries
 */
export async function preflight(options: PreflightOptions): Promise<Result<void, ValidationError>> {
  if (options.uid !== 0) {
    return Result.err(new ValidationError({ message: "This process needs to run with root privileges" }));
  }

  for (const binary of [options.relayDaemon, options.relayControl]) {
    const found = await options.runner.run(["which", binary]);
    if (found.isErr() || found.value.exitCode !== 0) {
      return Result.err(
        new ValidationError({
          message: `${binary} not found on PATH; install smcroute first`,
        })
      );
    }
  }

  return Result.ok(undefined);
}
