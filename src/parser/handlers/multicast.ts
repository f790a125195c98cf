/**
 * Resolution of multicast group addresses.
 *
 * @packageDocumentation
 */

import type { AddressFamily, SocketAddress } from '../../global/types.js';
import type { HostResolver } from '../../validators/address.js';
import { isMulticastAddress, resolveSocketAddress } from '../../validators/address.js';

/**
 * Outcome of resolving a multicast group.
 *
 * - `unresolved`: the token is neither a literal nor a known name
 * - `not-multicast`: it resolved, but not to a multicast address of the
 *   required family
 */
export type MulticastResolution =
  | { readonly success: true; readonly address: SocketAddress }
  | { readonly success: false; readonly reason: 'unresolved' | 'not-multicast' };

/**
 * Resolves `token` and checks that it is a multicast address.
 *
 * @param family - Required family, or `undefined` to accept either.
 */
export function resolveMulticastGroup(
  token: string,
  family: AddressFamily | undefined,
  resolver: HostResolver
): MulticastResolution {
  const address = resolveSocketAddress(token, 0, resolver);
  if (address === undefined) {
    return { success: false, reason: 'unresolved' };
  }
  if ((family !== undefined && address.family !== family) || !isMulticastAddress(address)) {
    return { success: false, reason: 'not-multicast' };
  }
  return { success: true, address };
}
