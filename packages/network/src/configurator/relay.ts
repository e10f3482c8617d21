/**
 * Binaries of the multicast relay (smcroute)
 */
export interface RelayBinaries {
  daemon: string;
  control: string;
}

export const DEFAULT_RELAY: RelayBinaries = {
  daemon: "smcrouted",
  control: "smcroutectl",
};

/**
 * Commands for the relay daemon instance owned by one node. Instances are
 * told apart by their control socket identity, `smcroute-<node>`.
 */
export class RelayDaemon {
  readonly identity: string;

  constructor(
    node: string,
    private readonly binaries: RelayBinaries = DEFAULT_RELAY
  ) {
    this.identity = `smcroute-${node}`;
  }

  start(): string {
    return `${this.binaries.daemon} -l debug -I ${this.identity}`;
  }

  /** Exits 0 once the daemon answers on its control socket */
  probe(): string {
    return this.control("show");
  }

  /** Relay `group` arriving on `inbound` out of every `outbound` interface */
  add(inbound: string, group: string, outbound: string[]): string {
    return this.control(`add ${inbound} ${group} ${outbound.join(" ")}`.trimEnd());
  }

  join(intf: string, group: string): string {
    return this.control(`join ${intf} ${group}`);
  }

  flush(): string {
    return this.control("flush");
  }

  kill(): string {
    return this.control("kill");
  }

  private control(args: string): string {
    return `${this.binaries.control} -I ${this.identity} ${args}`;
  }
}
