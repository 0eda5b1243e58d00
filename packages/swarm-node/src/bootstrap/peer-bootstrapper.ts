import { anySignal } from 'any-signal';
import { multiaddr, type Multiaddr } from '@multiformats/multiaddr';
import { peerIdFromString } from '@libp2p/peer-id';
import type { AbortOptions, PeerId } from '@libp2p/interface';
import { DIAL_TIMEOUT_MS } from '../constants.js';
import { AddressParseError, DialError, describeCause } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('bootstrap');
const logError = log.extend('error');

/** One remote peer and every address known for it. */
export interface PeerDescriptor {
	id: PeerId;
	addrs: Multiaddr[];
}

export interface DialOutcome {
	peerId: string;
	addrs: string[];
	error?: DialError;
}

export interface Dialer {
	dial(addrs: Multiaddr[], options?: AbortOptions): Promise<unknown>;
}

export interface ConnectOptions {
	signal?: AbortSignal;
	/** Per-peer limit; defaults to {@link DIAL_TIMEOUT_MS}. */
	timeoutMs?: number;
}

function parseOne(address: string): { id: PeerId, addr: Multiaddr } {
	let addr: Multiaddr;
	try {
		addr = multiaddr(address);
	} catch (err) {
		throw new AddressParseError(address, describeCause(err), { cause: err });
	}
	const idStr = addr.getPeerId();
	if (idStr == null) {
		throw new AddressParseError(address, 'no peer id component');
	}
	try {
		return { id: peerIdFromString(idStr), addr };
	} catch (err) {
		throw new AddressParseError(address, `bad peer id ${idStr}`, { cause: err });
	}
}

/**
 * Parses peer addresses and groups them by identity, unioning the addresses of
 * peers that appear more than once. Order of first appearance is kept.
 */
export function parsePeerAddresses(addresses: readonly string[]): PeerDescriptor[] {
	const byPeer = new Map<string, { id: PeerId, addrs: Map<string, Multiaddr> }>();
	for (const address of addresses) {
		const { id, addr } = parseOne(address);
		const key = id.toString();
		const entry = byPeer.get(key) ?? { id, addrs: new Map<string, Multiaddr>() };
		byPeer.set(key, entry);
		entry.addrs.set(addr.toString(), addr);
	}
	return Array.from(byPeer.values(), e => ({ id: e.id, addrs: Array.from(e.addrs.values()) }));
}

/**
 * Dials every distinct peer concurrently and waits for all attempts to finish.
 * Only malformed input rejects; a failed dial is logged and returned as an outcome.
 */
export async function connectToPeers(dialer: Dialer, addresses: readonly string[], options: ConnectOptions = {}): Promise<DialOutcome[]> {
	const peers = parsePeerAddresses(addresses);
	const timeoutMs = options.timeoutMs ?? DIAL_TIMEOUT_MS;
	log('dialing %d peers', peers.length);

	const outcomes = await Promise.all(peers.map(async (peer): Promise<DialOutcome> => {
		const peerId = peer.id.toString();
		const addrs = peer.addrs.map(a => a.toString());
		const signal = anySignal([options.signal, AbortSignal.timeout(timeoutMs)]);
		try {
			await dialer.dial(peer.addrs, { signal });
			log('connected to %s', peerId);
			return { peerId, addrs };
		} catch (err) {
			const error = new DialError(peerId, { cause: err });
			logError('%s', error.message);
			return { peerId, addrs, error };
		} finally {
			signal.clear();
		}
	}));

	const failed = outcomes.filter(o => o.error != null).length;
	log('bootstrap finished: %d connected, %d failed', outcomes.length - failed, failed);
	return outcomes;
}
