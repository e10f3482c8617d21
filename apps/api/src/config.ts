import { Result } from "better-result";
import { ValidationError } from "@pathmesh/errors";
import { isLogLevel, type LogLevel } from "@pathmesh/logger";
import { numToIP, parseCIDR, validateParams } from "@pathmesh/topology";

export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  defaultNodes: number;
  defaultPaths: number;
  namespacePrefix: string;
  relayDaemon: string;
  relayControl: string;
  natSubnet: string;
  externalInterface?: string;
  tuneHostBuffers: boolean;
  docsEnabled: boolean;
  skipPreflight: boolean;
}

export type Env = Record<string, string | undefined>;

export const DEFAULT_PORT = 5000;

export function parsePort(value: string | undefined): Result<number, ValidationError> {
  if (!value) {
    return Result.ok(DEFAULT_PORT);
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
    return Result.err(new ValidationError({ message: "PORT must be a valid TCP port" }));
  }

  return Result.ok(parsed);
}

export function parseBoolean(
  name: string,
  value: string | undefined,
  fallback: boolean
): Result<boolean, ValidationError> {
  if (value === undefined || value === "") {
    return Result.ok(fallback);
  }

  switch (value.toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return Result.ok(true);
    case "false":
    case "0":
    case "no":
      return Result.ok(false);
    default:
      return Result.err(new ValidationError({ message: `${name} must be true or false` }));
  }
}

function parseCount(name: string, value: string | undefined, fallback: number): Result<number, ValidationError> {
  if (value === undefined || value === "") {
    return Result.ok(fallback);
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    return Result.err(new ValidationError({ message: `${name} must be a positive integer` }));
  }

  return Result.ok(parsed);
}

function parseLogLevel(value: string | undefined): Result<LogLevel, ValidationError> {
  if (!value) {
    return Result.ok("info");
  }
  if (!isLogLevel(value)) {
    return Result.err(
      new ValidationError({ message: "LOG_LEVEL must be one of debug, info, warn, error" })
    );
  }
  return Result.ok(value);
}

function parseSubnet(value: string | undefined): Result<string, ValidationError> {
  const parsed = parseCIDR(value || "11.0.0.0/8");
  if (parsed.isErr()) {
    return Result.err(new ValidationError({ message: "NAT_SUBNET must be an IPv4 CIDR" }));
  }
  // Network address only: "11.1.2.3/8" becomes "11.0.0.0/8"
  return Result.ok(`${numToIP(parsed.value.network)}/${parsed.value.prefixLen}`);
}

/**
 * Read the application configuration from environment variables
 */
export function loadConfig(env: Env = process.env): Result<AppConfig, ValidationError> {
  const port = parsePort(env.PORT);
  if (port.isErr()) return Result.err(port.error);

  const logLevel = parseLogLevel(env.LOG_LEVEL);
  if (logLevel.isErr()) return Result.err(logLevel.error);

  const defaultNodes = parseCount("DEFAULT_NODES", env.DEFAULT_NODES, 2);
  if (defaultNodes.isErr()) return Result.err(defaultNodes.error);

  const defaultPaths = parseCount("DEFAULT_PATHS", env.DEFAULT_PATHS, 2);
  if (defaultPaths.isErr()) return Result.err(defaultPaths.error);

  // Defaults must describe a buildable topology
  const defaults = validateParams({ nodes: defaultNodes.value, paths: defaultPaths.value });
  if (defaults.isErr()) {
    return Result.err(
      new ValidationError({ message: `Invalid default topology: ${defaults.error.message}` })
    );
  }

  const natSubnet = parseSubnet(env.NAT_SUBNET);
  if (natSubnet.isErr()) return Result.err(natSubnet.error);

  const tuneHostBuffers = parseBoolean("TUNE_HOST_BUFFERS", env.TUNE_HOST_BUFFERS, true);
  if (tuneHostBuffers.isErr()) return Result.err(tuneHostBuffers.error);

  const docsEnabled = parseBoolean("DOCS_ENABLED", env.DOCS_ENABLED, true);
  if (docsEnabled.isErr()) return Result.err(docsEnabled.error);

  const skipPreflight = parseBoolean("SKIP_PREFLIGHT", env.SKIP_PREFLIGHT, false);
  if (skipPreflight.isErr()) return Result.err(skipPreflight.error);

  return Result.ok({
    port: port.value,
    host: env.HOST || "0.0.0.0",
    logLevel: logLevel.value,
    defaultNodes: defaultNodes.value,
    defaultPaths: defaultPaths.value,
    namespacePrefix: env.NETNS_PREFIX || "pm-",
    relayDaemon: env.RELAY_DAEMON || "smcrouted",
    relayControl: env.RELAY_CONTROL || "smcroutectl",
    natSubnet: natSubnet.value,
    externalInterface: env.EXTERNAL_INTERFACE || undefined,
    tuneHostBuffers: tuneHostBuffers.value,
    docsEnabled: docsEnabled.value,
    skipPreflight: skipPreflight.value,
  });
}
