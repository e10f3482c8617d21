/**
 * IPv4 addressing helpers
 *
 * Every subnet in a topology is a /24. Router j owns the first octet
 * `11 + j`; the gateway router's uplinks borrow it as the second octet
 * under 11.0.0.0/8.
 */

import { Result } from "better-result";
import { ValidationError } from "@pathmesh/errors";

export const BASE_OCTET = 11;
export const MULTICAST_PREFIX = "239.0";

/**
 * Parse a CIDR notation string (e.g., "11.0.0.0/8")
 */
export function parseCIDR(cidr: string): Result<
  { network: number; prefixLen: number; mask: number },
  ValidationError
> {
  const [ipStr, prefixStr, ...rest] = cidr.split("/");
  const prefixLen = Number(prefixStr);

  if (rest.length > 0 || !Number.isInteger(prefixLen) || prefixLen < 0 || prefixLen > 32) {
    return Result.err(new ValidationError({ message: `Invalid prefix length in ${cidr}` }));
  }
  if (!isIPv4(ipStr)) {
    return Result.err(new ValidationError({ message: `Invalid IP address: ${ipStr}` }));
  }

  const mask = prefixLen === 0 ? 0 : (0xffffffff << (32 - prefixLen)) >>> 0;
  const network = (ipToNum(ipStr) & mask) >>> 0;

  return Result.ok({ network, prefixLen, mask });
}

export function isIPv4(value: string): boolean {
  const parts = value.split(".");
  return (
    parts.length === 4 &&
    parts.every((p) => /^\d{1,3}$/.test(p) && Number(p) <= 255)
  );
}

/**
 * Convert a 32-bit number to an IP address string
 */
export function numToIP(num: number): string {
  return [
    (num >>> 24) & 0xff,
    (num >>> 16) & 0xff,
    (num >>> 8) & 0xff,
    num & 0xff,
  ].join(".");
}

/**
 * Convert an IP address string to a 32-bit number
 */
export function ipToNum(ip: string): number {
  const parts = ip.split(".").map((p) => parseInt(p, 10));
  return ((parts[0] << 24) | (parts[1] << 16) | (parts[2] << 8) | parts[3]) >>> 0;
}

export function firstOctet(address: string): number {
  return parseInt(address.split(".")[0], 10);
}

/** First octet owned by router j */
export function pathPrefix(j: number): number {
  return BASE_OCTET + j;
}

/** Network part (three octets) of the link between edge i and router j */
export function edgeLinkNetwork(i: number, j: number): string {
  return `${pathPrefix(j)}.0.${i}`;
}

/** Network part of the gateway host's external link */
export function externalNetwork(nodes: number): string {
  return `${pathPrefix(0)}.0.${nodes + 1}`;
}

/** Network part of path router j's uplink to the gateway router */
export function uplinkNetwork(j: number): string {
  return `${BASE_OCTET}.${pathPrefix(j)}.1`;
}

export function hostAddress(network: string, host: number): string {
  return `${network}.${host}`;
}

/** Group relayed by a router on its interface k */
export function multicastGroup(k: number): string {
  return `${MULTICAST_PREFIX}.${k}.1`;
}

export function multicastRange(k: number): string {
  return `${MULTICAST_PREFIX}.${k}.0/24`;
}
