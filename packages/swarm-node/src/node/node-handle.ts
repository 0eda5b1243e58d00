import type { AbortOptions, PeerData, PeerId } from '@libp2p/interface';
import type { Multiaddr } from '@multiformats/multiaddr';
import type { Repository } from '../repo/repo-store.js';

/** The part of a libp2p host the peering service needs. */
export interface PeeringHost {
	readonly peerStore: {
		merge(peerId: PeerId, data: PeerData, options?: AbortOptions): Promise<unknown>;
	};
	getConnections(peerId?: PeerId): unknown[];
	dial(peer: PeerId | Multiaddr[], options?: AbortOptions): Promise<unknown>;
}

/**
 * A running node bound to one repository and one lifetime signal.
 * At most one handle per repository is live at a time.
 */
export interface NodeHandle extends PeeringHost {
	readonly peerId: string;
	readonly repo: Repository;
	readonly signal: AbortSignal;
	/** Long-lived service process rather than a one-shot command. */
	readonly daemon: boolean;
	getMultiaddrs(): Multiaddr[];
	storageUsage(): Promise<number>;
	/** Registers background work that `stop()` must wait for. */
	track<T>(task: Promise<T>): Promise<T>;
	/** Resolves once the node is stopped, tracked work has settled and the repository is released. */
	stop(): Promise<void>;
}

export interface NodeFactory {
	build(repo: Repository, signal: AbortSignal): Promise<NodeHandle>;
}
