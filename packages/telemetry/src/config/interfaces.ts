/**
 * Resolve the bind IP from an ordered list of interface specifiers.
 *
 * Supported specifiers:
 *   static:10.1.2.3   a literal IP
 *   eth0, eth0:inet   first IPv4 address of eth0
 *   eth0:inet6        first IPv6 address of eth0
 *   eth0[1]           second address of eth0 (any family)
 *   inet, inet6       first non-internal IPv4 / IPv6 address on any interface
 *   10.0.0.0/16       first address inside the network
 *
 * The first specifier that matches wins.
 */

import { BlockList, isIP } from "node:net";
import { networkInterfaces, type NetworkInterfaceInfo } from "node:os";
import { ConfigError } from "../telemetry/errors.js";

export type InterfaceTable = Record<string, NetworkInterfaceInfo[] | undefined>;

type Family = "IPv4" | "IPv6";

const DEFAULT_SPECIFIERS = ["inet"];

/** One parsed specifier, applied against the interface table */
type Matcher = (table: InterfaceTable) => string | undefined;

function familyOf(value: string): Family | undefined {
  if (value === "inet") return "IPv4";
  if (value === "inet6") return "IPv6";
  return undefined;
}

function parseSpecifier(spec: string): Matcher {
  const trimmed = spec.trim();

  if (trimmed.startsWith("static:")) {
    const ip = trimmed.slice("static:".length);
    if (isIP(ip) === 0) {
      throw new ConfigError(`Unable to parse static ip ${ip} in ${spec}`);
    }
    return () => ip;
  }

  const anyFamily = familyOf(trimmed);
  if (anyFamily) {
    return (table) =>
      Object.values(table)
        .flatMap((addrs) => addrs ?? [])
        .find((a) => a.family === anyFamily && !a.internal)?.address;
  }

  if (trimmed.includes("/")) {
    const [network, prefixText] = trimmed.split("/", 2);
    const version = isIP(network);
    const prefix = Number(prefixText);
    const maxPrefix = version === 6 ? 128 : 32;
    if (version === 0 || !Number.isInteger(prefix) || prefix < 0 || prefix > maxPrefix) {
      throw new ConfigError(`Unable to parse CIDR ${spec}`);
    }
    const family: Family = version === 6 ? "IPv6" : "IPv4";
    const subnet = new BlockList();
    subnet.addSubnet(network, prefix, version === 6 ? "ipv6" : "ipv4");
    return (table) =>
      Object.values(table)
        .flatMap((addrs) => addrs ?? [])
        .find(
          (a) =>
            a.family === family &&
            subnet.check(a.address, family === "IPv6" ? "ipv6" : "ipv4"),
        )?.address;
  }

  const indexed = /^([^[\]:]+)\[(\d+)\]$/.exec(trimmed);
  if (indexed) {
    const [, name, index] = indexed;
    return (table) => table[name]?.[Number(index)]?.address;
  }

  const named = /^([^[\]:]+)(?::(inet6?))?$/.exec(trimmed);
  if (named) {
    const [, name, familyText] = named;
    const family = familyOf(familyText ?? "inet");
    return (table) => table[name]?.find((a) => a.family === family)?.address;
  }

  throw new ConfigError(`Unable to parse interface specification: ${spec}`);
}

/**
 * Return the first IP matched by `specifiers`.
 * An empty list means `["inet"]`. Throws ConfigError when nothing matches
 * or a specifier is malformed.
 */
export function resolveInterfaceIp(
  specifiers: string[],
  table: InterfaceTable = networkInterfaces(),
): string {
  const specs = specifiers.length > 0 ? specifiers : DEFAULT_SPECIFIERS;
  const matchers = specs.map(parseSpecifier);

  for (const match of matchers) {
    const ip = match(table);
    if (ip) return ip;
  }

  throw new ConfigError(
    `None of the interface specifications were able to match: ${specs.join(", ")}`,
  );
}
