import { anySignal } from 'any-signal';
import { KEEP_ALIVE, type PeerId, type Startable } from '@libp2p/interface';
import type { Multiaddr } from '@multiformats/multiaddr';
import { DIAL_TIMEOUT_MS } from '../constants.js';
import { describeCause } from '../errors.js';
import { createLogger } from '../logger.js';
import type { PeeringHost } from '../node/node-handle.js';

const log = createLogger('peering');

export type PeeringServiceInit = {
	/** How often disconnected peers are checked. */
	intervalMs?: number;
	initialBackoffMs?: number;
	maxBackoffMs?: number;
	dialTimeoutMs?: number;
};

type PeerState = {
	id: PeerId;
	addrs: Multiaddr[];
	backoffMs: number;
	nextAttempt: number;
	dialing?: Promise<void>;
};

/**
 * Keeps standing connections to a fixed set of peers. Peers are tagged
 * keep-alive so the connection manager never prunes them, and any peer found
 * disconnected is redialed with exponential backoff.
 */
export class PeeringService implements Startable {
	private running = false;
	private timer: ReturnType<typeof setInterval> | undefined;
	private controller = new AbortController();
	private readonly peers = new Map<string, PeerState>();
	private readonly cfg: Required<PeeringServiceInit>;

	constructor(private readonly host: PeeringHost, init: PeeringServiceInit = {}) {
		this.cfg = {
			intervalMs: init.intervalMs ?? 10_000,
			initialBackoffMs: init.initialBackoffMs ?? 5_000,
			maxBackoffMs: init.maxBackoffMs ?? 10 * 60_000,
			dialTimeoutMs: init.dialTimeoutMs ?? DIAL_TIMEOUT_MS
		};
	}

	get [Symbol.toStringTag](): string { return '@waypost/peering'; }

	isStarted(): boolean { return this.running; }

	async addPeer(id: PeerId, addrs: Multiaddr[]): Promise<void> {
		const key = id.toString();
		const existing = this.peers.get(key);
		const state: PeerState = existing ?? { id, addrs: [], backoffMs: this.cfg.initialBackoffMs, nextAttempt: 0 };
		const known = new Set(state.addrs.map(a => a.toString()));
		state.addrs.push(...addrs.filter(a => !known.has(a.toString())));
		this.peers.set(key, state);
		if (this.running) {
			await this.protect(state);
			this.maintain();
		}
	}

	removePeer(id: PeerId): void {
		this.peers.delete(id.toString());
	}

	listPeers(): Array<{ peerId: string, addrs: string[] }> {
		return Array.from(this.peers.values(), s => ({ peerId: s.id.toString(), addrs: s.addrs.map(a => a.toString()) }));
	}

	async start(): Promise<void> {
		if (this.running) return;
		this.running = true;
		this.controller = new AbortController();
		for (const state of this.peers.values()) {
			await this.protect(state);
		}
		this.maintain();
		this.timer = setInterval(() => { this.maintain(); }, this.cfg.intervalMs);
		this.timer.unref?.();
	}

	async stop(): Promise<void> {
		this.running = false;
		clearInterval(this.timer);
		this.timer = undefined;
		this.controller.abort();
		await this.whenIdle();
	}

	/** Resolves once every dial currently in flight has finished. */
	async whenIdle(): Promise<void> {
		const inflight: Promise<void>[] = [];
		for (const state of this.peers.values()) {
			if (state.dialing != null) inflight.push(state.dialing);
		}
		await Promise.all(inflight);
	}

	private async protect(state: PeerState): Promise<void> {
		await this.host.peerStore.merge(state.id, {
			multiaddrs: state.addrs,
			tags: { [KEEP_ALIVE]: {} }
		});
	}

	private maintain(): void {
		const now = Date.now();
		for (const state of this.peers.values()) {
			if (state.dialing != null) continue;
			if (this.host.getConnections(state.id).length > 0) {
				state.backoffMs = this.cfg.initialBackoffMs;
				state.nextAttempt = 0;
				continue;
			}
			if (now < state.nextAttempt) continue;
			state.dialing = this.redial(state).finally(() => { state.dialing = undefined; });
		}
	}

	private async redial(state: PeerState): Promise<void> {
		const signal = anySignal([this.controller.signal, AbortSignal.timeout(this.cfg.dialTimeoutMs)]);
		try {
			await this.host.dial(state.id, { signal });
			state.backoffMs = this.cfg.initialBackoffMs;
			state.nextAttempt = 0;
			log('connected to peer %s', state.id);
		} catch (err) {
			state.nextAttempt = Date.now() + state.backoffMs;
			log('dial to peer %s failed, retrying in %dms - %s', state.id, state.backoffMs, describeCause(err));
			state.backoffMs = Math.min(state.backoffMs * 2, this.cfg.maxBackoffMs);
		} finally {
			signal.clear();
		}
	}
}
