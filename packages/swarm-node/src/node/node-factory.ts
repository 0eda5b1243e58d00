import '../compat.js';
import { createLibp2p, type Libp2p, type Libp2pOptions, type ServiceFactoryMap } from 'libp2p';
import { tcp } from '@libp2p/tcp';
import { noise } from '@chainsafe/libp2p-noise';
import { yamux } from '@chainsafe/libp2p-yamux';
import { identify, type Identify } from '@libp2p/identify';
import { ping, type Ping } from '@libp2p/ping';
import { kadDHT, type KadDHT } from '@libp2p/kad-dht';
import { bootstrap } from '@libp2p/bootstrap';
import { circuitRelayTransport } from '@libp2p/circuit-relay-v2';
import { privateKeyFromProtobuf } from '@libp2p/crypto/keys';
import { peerIdFromPrivateKey } from '@libp2p/peer-id';
import { fromString as u8FromString } from 'uint8arrays/from-string';
import type { AbortOptions, PeerId, PrivateKey } from '@libp2p/interface';
import type { Multiaddr } from '@multiformats/multiaddr';
import { ConstructionError, describeCause } from '../errors.js';
import { createLogger } from '../logger.js';
import type { RoutingType } from '../repo/config.js';
import { RepositoryStore, type ReleaseLock, type Repository } from '../repo/repo-store.js';
import { isCircuitAddress, relayListenAddress } from '../relay/circuit.js';
import { StorageMonitor } from '../storage/storage-monitor.js';
import type { NodeFactory, NodeHandle } from './node-handle.js';

const log = createLogger('node');
const logError = log.extend('error');

export type SwarmServices = {
	identify: Identify;
	ping: Ping;
	dht?: KadDHT;
};

export type SwarmLibp2p = Libp2p<SwarmServices>;

export interface BuildOptions {
	/** Defaults to true; the node runs as a long-lived service. */
	daemon?: boolean;
}

export class SwarmNode implements NodeHandle {
	private readonly tasks = new Set<Promise<unknown>>();
	private readonly monitor: StorageMonitor;
	private stopping: Promise<void> | undefined;

	constructor(
		readonly libp2p: SwarmLibp2p,
		readonly repo: Repository,
		readonly signal: AbortSignal,
		private readonly releaseLock: ReleaseLock,
		readonly daemon: boolean
	) {
		this.monitor = new StorageMonitor(repo);
	}

	get peerId(): string {
		return this.libp2p.peerId.toString();
	}

	get peerStore(): NodeHandle['peerStore'] {
		return this.libp2p.peerStore;
	}

	getMultiaddrs(): Multiaddr[] {
		return this.libp2p.getMultiaddrs();
	}

	getConnections(peerId?: PeerId): unknown[] {
		return this.libp2p.getConnections(peerId);
	}

	async dial(peer: PeerId | Multiaddr[], options?: AbortOptions): Promise<unknown> {
		return this.libp2p.dial(peer, options);
	}

	async storageUsage(): Promise<number> {
		return this.monitor.getUsage();
	}

	track<T>(task: Promise<T>): Promise<T> {
		this.tasks.add(task);
		const forget = (): void => { this.tasks.delete(task); };
		task.then(forget, forget);
		return task;
	}

	async stop(): Promise<void> {
		this.stopping ??= this.teardown();
		return this.stopping;
	}

	private async teardown(): Promise<void> {
		try {
			await this.libp2p.stop();
			await Promise.allSettled([...this.tasks]);
		} finally {
			await this.releaseLock();
			log('node %s stopped, repository %s released', this.peerId, this.repo.path);
		}
	}
}

/** Builds libp2p nodes from repositories, holding each repository's lock for the node's life. */
export class Libp2pNodeFactory implements NodeFactory {
	constructor(private readonly store: RepositoryStore = new RepositoryStore()) { }

	async build(repo: Repository, signal: AbortSignal, options: BuildOptions = {}): Promise<SwarmNode> {
		if (signal.aborted) {
			throw new ConstructionError('lifetime was canceled before the node was built');
		}

		let release: ReleaseLock;
		try {
			release = await this.store.lock(repo.path);
		} catch (err) {
			throw new ConstructionError(`cannot take repository ${repo.path}: ${describeCause(err)}`, { cause: err });
		}

		let libp2p: SwarmLibp2p | undefined;
		try {
			const privateKey = this.loadIdentity(repo);
			libp2p = await createLibp2p(this.libp2pOptions(repo, privateKey));
			await libp2p.start();
		} catch (err) {
			await libp2p?.stop().catch((stopErr: unknown) => { logError('cleanup after failed start - %o', stopErr); });
			await release();
			throw new ConstructionError(`failed to construct node from ${repo.path}: ${describeCause(err)}`, { cause: err });
		}

		const node = new SwarmNode(libp2p, repo, signal, release, options.daemon ?? true);
		const onAbort = (): void => {
			node.stop().catch((err: unknown) => { logError('stopping canceled node %s - %o', node.peerId, err); });
		};
		if (signal.aborted) {
			onAbort();
		} else {
			signal.addEventListener('abort', onAbort, { once: true });
		}

		log('node %s started (routing %s) listening on %o', node.peerId, repo.config.Routing.Type,
			node.getMultiaddrs().map(ma => ma.toString()));
		return node;
	}

	identity(node: NodeHandle): string {
		return node.peerId;
	}

	/** Bytes on disk across the node's datastore mounts; rejects with `RepoIOError`. */
	async storageUsage(node: NodeHandle): Promise<number> {
		return node.storageUsage();
	}

	private loadIdentity(repo: Repository): PrivateKey {
		const privateKey = privateKeyFromProtobuf(u8FromString(repo.config.Identity.PrivKey, 'base64pad'));
		const peerId = peerIdFromPrivateKey(privateKey).toString();
		if (peerId !== repo.config.Identity.PeerID) {
			throw new Error(`private key belongs to ${peerId}, config names ${repo.config.Identity.PeerID}`);
		}
		return privateKey;
	}

	private libp2pOptions(repo: Repository, privateKey: PrivateKey): Libp2pOptions<SwarmServices> {
		const { Swarm, Announce } = repo.config.Addresses;
		const relayListen = Announce.filter(isCircuitAddress).map(relayListenAddress);
		const bootstrapList = repo.config.Bootstrap;

		// peer store and DHT records stay in memory; the Datastore.Spec mounts belong to the block store
		return {
			start: false,
			privateKey,
			addresses: {
				listen: [...Swarm, ...relayListen],
				announce: Announce
			},
			transports: [tcp(), circuitRelayTransport()],
			connectionEncrypters: [noise()],
			streamMuxers: [yamux()],
			peerDiscovery: bootstrapList.length > 0 ? [bootstrap({ list: bootstrapList })] : [],
			services: this.services(repo.config.Routing.Type)
		};
	}

	private services(routing: RoutingType): ServiceFactoryMap<SwarmServices> {
		const base = {
			identify: identify(),
			ping: ping()
		};
		if (routing === 'none') {
			return base;
		}
		// dhtserver and dht both serve and fetch records
		return { ...base, dht: kadDHT({ clientMode: routing === 'dhtclient' }) };
	}
}
