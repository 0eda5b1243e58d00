import { setTimeout as sleep } from 'node:timers/promises';
import type { Multiaddr } from '@multiformats/multiaddr';
import { GRACE_PERIOD_MS } from '../constants.js';
import { createLogger } from '../logger.js';
import { isCircuitAddress } from '../relay/circuit.js';

const log = createLogger('reachability');

export type Reachability = 'reachable' | 'nat-bound';

/**
 * Address prefixes that cannot be dialed from the public internet:
 * loopback, two private IPv4 ranges, link-local, and the whole IPv6 family.
 */
export const PRIVATE_PREFIXES: readonly string[] = [
	'/ip4/127.',
	'/ip4/10.',
	'/ip4/192.168.',
	'/ip4/169.254.',
	'/ip6/'
];

export function isPrivateAddress(addr: string): boolean {
	return PRIVATE_PREFIXES.some(prefix => addr.startsWith(prefix));
}

/** Reachable iff at least one address is public; an empty list is NAT-bound. */
export function classifyAddresses(addrs: readonly string[]): Reachability {
	return addrs.some(addr => !isPrivateAddress(addr)) ? 'reachable' : 'nat-bound';
}

export interface ProbeTarget {
	getMultiaddrs(): Multiaddr[];
}

export interface ProbeOptions {
	graceMs?: number;
	signal?: AbortSignal;
}

/**
 * Waits for address discovery to settle, then classifies the node's own addresses.
 * This is a heuristic: nothing dials back to confirm.
 */
export async function probeReachability(node: ProbeTarget, options: ProbeOptions = {}): Promise<Reachability> {
	const graceMs = options.graceMs ?? GRACE_PERIOD_MS;
	log('waiting %dms before probing', graceMs);
	await sleep(graceMs, undefined, { signal: options.signal });

	const addrs = node.getMultiaddrs()
		.map(ma => ma.toString())
		.filter(addr => !isCircuitAddress(addr));
	const result = classifyAddresses(addrs);
	log('observed %o -> %s', addrs, result);
	return result;
}
