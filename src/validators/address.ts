/**
 * Socket-address validators.
 *
 * Numeric literals are parsed with ipaddr.js. Anything else goes to a
 * {@link HostResolver}, which stands in for the system's name resolution.
 *
 * @packageDocumentation
 */

import ipaddr from 'ipaddr.js';
import type { SocketAddress } from '../global/types.js';

/**
 * Resolves a host name to a socket address.
 */
export interface HostResolver {
  /**
   * @param host - Host name as written in the configuration.
   * @param port - Port to attach to the resolved address.
   * @returns The address, or `undefined` when the name does not resolve.
   */
  resolve(host: string, port: number): SocketAddress | undefined;
}

/**
 * Parses a numeric IPv4 (dotted quad) or IPv6 literal.
 *
 * @param token - The literal.
 * @param port - Port to attach.
 * @returns The address, or `undefined` when the token is not a numeric literal.
 */
export function parseNumericAddress(token: string, port: number): SocketAddress | undefined {
  if (ipaddr.IPv4.isValidFourPartDecimal(token)) {
    return { family: 'ipv4', address: ipaddr.IPv4.parse(token).toString(), port };
  }
  if (ipaddr.IPv6.isValid(token)) {
    return { family: 'ipv6', address: ipaddr.IPv6.parse(token).toString(), port };
  }
  return undefined;
}

/**
 * Whether a token may be handed to numeric parsing at all.
 *
 * A literal address never contains `-` or `/`; such tokens go straight to
 * name resolution.
 */
export function mayBeNumericAddress(token: string): boolean {
  return !/[-/]/.test(token);
}

/**
 * Resolves a token to a socket address: numeric parsing first, then the
 * resolver.
 *
 * @param token - Literal address or host name.
 * @param port - Port to attach.
 * @param resolver - Name resolver used when numeric parsing does not apply or fails.
 * @returns The address, or `undefined` when neither method succeeds.
 */
export function resolveSocketAddress(
  token: string,
  port: number,
  resolver: HostResolver
): SocketAddress | undefined {
  if (mayBeNumericAddress(token)) {
    const numeric = parseNumericAddress(token, port);
    if (numeric !== undefined) {
      return numeric;
    }
  }
  return resolver.resolve(token, port);
}

/**
 * Whether an address lies in its family's multicast range
 * (224.0.0.0/4 or ff00::/8). The unspecified address is not multicast.
 */
export function isMulticastAddress(address: SocketAddress): boolean {
  if (address.family === 'unspecified') {
    return false;
  }
  if (address.family === 'ipv4') {
    return ipaddr.IPv4.parse(address.address).range() === 'multicast';
  }
  return ipaddr.IPv6.parse(address.address).range() === 'multicast';
}

/**
 * Resolver backed by a fixed table of names to numeric literals, in the
 * manner of a hosts file.
 *
 * @example
 * ```typescript
 * const resolver = new StaticHostResolver({ 'mail.example.test': '192.0.2.25' });
 * resolver.resolve('mail.example.test', 25);
 * // { family: 'ipv4', address: '192.0.2.25', port: 25 }
 * ```
 */
export class StaticHostResolver implements HostResolver {
  private readonly hosts: ReadonlyMap<string, string>;

  /**
   * @param hosts - Host name to numeric address. `localhost` resolves to
   *   127.0.0.1 unless the table says otherwise.
   */
  constructor(hosts: Readonly<Record<string, string>> = {}) {
    const table = new Map<string, string>([['localhost', '127.0.0.1']]);
    for (const [name, address] of Object.entries(hosts)) {
      table.set(name.toLowerCase(), address);
    }
    this.hosts = table;
  }

  resolve(host: string, port: number): SocketAddress | undefined {
    const literal = this.hosts.get(host.toLowerCase());
    return literal === undefined ? undefined : parseNumericAddress(literal, port);
  }
}
