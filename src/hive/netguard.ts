/**
 * Outbound address guard
 *
 * Every coordinator call resolves the host first and refuses to connect
 * unless all resolved addresses are public unicast. Resolution errors count
 * as a refusal.
 */

import { promises as dns } from 'dns';
import * as ipaddr from 'ipaddr.js';

export type HostResolver = (hostname: string) => Promise<string[]>;

export type IpAddress = ipaddr.IPv4 | ipaddr.IPv6;

export const systemResolver: HostResolver = async (hostname) => {
  const results = await dns.lookup(hostname, { all: true, verbatim: true });
  return results.map(r => r.address);
};

/**
 * Parse a hostname that is itself an IP literal (brackets allowed for v6)
 */
export function parseIpLiteral(hostname: string): IpAddress | null {
  const bare = hostname.startsWith('[') && hostname.endsWith(']')
    ? hostname.slice(1, -1)
    : hostname;
  if (!ipaddr.isValid(bare)) return null;
  // process() unwraps IPv4-mapped IPv6 so ::ffff:10.0.0.1 is judged as 10.0.0.1
  return ipaddr.process(bare);
}

/**
 * Only global unicast passes. Private, loopback, link-local, CGNAT,
 * unique-local, multicast, reserved and translation ranges do not.
 */
export function isPublicAddress(address: IpAddress): boolean {
  return address.range() === 'unicast';
}

export class BlockedAddressError extends Error {
  constructor(
    message: string,
    public readonly hostname: string
  ) {
    super(message);
    this.name = 'BlockedAddressError';
  }
}

/**
 * Resolve `hostname` and throw unless every address is public
 */
export async function assertRoutableHost(
  hostname: string,
  resolve: HostResolver = systemResolver
): Promise<string[]> {
  const literal = parseIpLiteral(hostname);
  let addresses: string[];

  if (literal) {
    addresses = [literal.toString()];
  } else {
    try {
      addresses = await resolve(hostname);
    } catch (error) {
      throw new BlockedAddressError(
        `DNS resolution failed for ${hostname}: ${error instanceof Error ? error.message : String(error)}`,
        hostname
      );
    }
  }

  if (addresses.length === 0) {
    throw new BlockedAddressError(`DNS returned no addresses for ${hostname}`, hostname);
  }

  for (const address of addresses) {
    const parsed = parseIpLiteral(address);
    if (!parsed) {
      throw new BlockedAddressError(`Unparseable address ${address} for ${hostname}`, hostname);
    }
    if (!isPublicAddress(parsed)) {
      throw new BlockedAddressError(
        `${hostname} resolves to non-routable address ${address} (${parsed.range()})`,
        hostname
      );
    }
  }

  return addresses;
}
