/**
 * NAT (Network Address Translation) Configuration
 *
 * Masquerades the emulated address space through the host's external
 * interface so nodes reach the outside world via the gateway host.
 * Uses nftables (modern) with iptables fallback.
 */

import { Result } from "better-result";
import { FabricError } from "@pathmesh/errors";
import { runChecked, type CommandRunner } from "../shell";

export interface NATConfig {
  /** The subnet in CIDR notation (e.g., "11.0.0.0/8") */
  subnet: string;
  /** The external interface to masquerade through (e.g., "eth0") */
  externalInterface: string;
  /** Table name for nftables (default: "pathmesh") */
  tableName?: string;
}

export const DEFAULT_NAT_TABLE = "pathmesh";

/**
 * nftables configuration generator
 */
export class NFTablesConfig {
  readonly tableName: string;
  private readonly subnet: string;
  private readonly extIface: string;

  constructor(config: NATConfig) {
    this.subnet = config.subnet;
    this.extIface = config.externalInterface;
    this.tableName = config.tableName ?? DEFAULT_NAT_TABLE;
  }

  generateConfig(): string {
    return `table ip ${this.tableName} {
  chain postrouting {
    type nat hook postrouting priority srcnat; policy accept;
    ip saddr ${this.subnet} oifname "${this.extIface}" masquerade
  }

  chain forward {
    type filter hook forward priority filter; policy accept;
    ct state established,related accept
    ip saddr ${this.subnet} oifname "${this.extIface}" accept
    ip daddr ${this.subnet} iifname "${this.extIface}" accept
  }
}
`;
  }
}

function iptablesRules(config: NATConfig, op: "-A" | "-D"): string[][] {
  const { subnet, externalInterface } = config;
  return [
    ["iptables", "-t", "nat", op, "POSTROUTING", "-s", subnet, "-o", externalInterface, "-j", "MASQUERADE"],
    ["iptables", op, "FORWARD", "-m", "conntrack", "--ctstate", "RELATED,ESTABLISHED", "-j", "ACCEPT"],
    ["iptables", op, "FORWARD", "-s", subnet, "-o", externalInterface, "-j", "ACCEPT"],
    ["iptables", op, "FORWARD", "-d", subnet, "-i", externalInterface, "-j", "ACCEPT"],
  ];
}

/**
 * Shell-driven NAT setup on the host
 */
export class NATManager {
  constructor(private readonly runner: CommandRunner) {}

  async isNFTablesAvailable(): Promise<boolean> {
    const result = await this.runner.run(["nft", "--version"]);
    return result.isOk() && result.value.exitCode === 0;
  }

  /**
   * Detect the interface carrying the default route
   */
  async detectExternalInterface(): Promise<string | null> {
    const result = await this.runner.run(["ip", "route", "show", "default"]);
    if (result.isErr()) return null;
    const match = result.value.stdout.match(/default via \S+ dev (\S+)/);
    return match ? match[1] : null;
  }

  async apply(config: NATConfig): Promise<Result<void, FabricError>> {
    const forward = await this.check(["sysctl", "-w", "net.ipv4.ip_forward=1"]);
    if (forward.isErr()) return forward;

    if (await this.isNFTablesAvailable()) {
      const nft = new NFTablesConfig(config);
      // Replace any table left by an earlier run
      await this.runner.run(["nft", "delete", "table", "ip", nft.tableName]);
      return this.check(["nft", "-f", "-"], nft.generateConfig());
    }

    for (const rule of iptablesRules(config, "-A")) {
      const result = await this.check(rule);
      if (result.isErr()) return result;
    }
    return Result.ok(undefined);
  }

  async remove(config: NATConfig): Promise<Result<void, FabricError>> {
    if (await this.isNFTablesAvailable()) {
      const tableName = config.tableName ?? DEFAULT_NAT_TABLE;
      const result = await this.runner.run(["nft", "delete", "table", "ip", tableName]);
      if (result.isErr()) return Result.err(result.error);
      const { exitCode, stderr } = result.value;
      // Exit code 1 with "No such file or directory" is ok (table doesn't exist)
      if (exitCode !== 0 && !stderr.includes("No such file or directory")) {
        return Result.err(
          new FabricError({ message: `nft delete failed: ${stderr.trim()}`, exitCode, stderr })
        );
      }
      return Result.ok(undefined);
    }

    // Rules may already be gone
    for (const rule of iptablesRules(config, "-D")) {
      await this.runner.run(rule);
    }
    return Result.ok(undefined);
  }

  private async check(argv: string[], input?: string): Promise<Result<void, FabricError>> {
    const result = await runChecked(this.runner, argv, input === undefined ? {} : { input });
    return result.isErr() ? Result.err(result.error) : Result.ok(undefined);
  }
}
