import { connectToPeers, type DialOutcome } from './bootstrap/peer-bootstrapper.js';
import { INTRODUCTION_PEERS } from './constants.js';
import { InvalidTransitionError, NeedsMigrationError, NotInitializedError } from './errors.js';
import { createLifetime } from './lifetime.js';
import { createLogger } from './logger.js';
import { Libp2pNodeFactory } from './node/node-factory.js';
import type { NodeFactory } from './node/node-handle.js';
import type { PeeringService, PeeringServiceInit } from './peering/peering-service.js';
import { probeReachability, type ProbeOptions, type ProbeTarget, type Reachability } from './reachability/probe.js';
import { RelayReconfigurer, type ActiveNode, type SwarmMode } from './relay/relay-reconfigurer.js';
import { RepositoryStore, type CreateRepoOptions, type Repository } from './repo/repo-store.js';

const log = createLogger('supervisor');
const logError = log.extend('error');

export interface SwarmInitOptions {
	/** Repository directory. */
	path: string;
	/** When false the reachability probe is skipped and the node stays in direct mode. */
	online: boolean;
	relayAddress?: string;
	introductionPeers?: readonly string[];
	graceMs?: number;
	settleMs?: number;
	dialTimeoutMs?: number;
	createOptions?: CreateRepoOptions;
	peering?: PeeringServiceInit;
}

/** Read-only view of the running node for collaborators outside the startup flow. */
export interface SwarmView {
	readonly peerId: string;
	readonly mode: SwarmMode;
	readonly daemon: boolean;
	/** Outcomes of the bootstrap dials launched against the current node. */
	readonly bootstrapped: Promise<DialOutcome[]>;
	addresses(): string[];
	storageUsage(): Promise<number>;
}

export interface SwarmSupervisorDeps {
	store?: RepositoryStore;
	factory?: NodeFactory;
	probe?: (node: ProbeTarget, options: ProbeOptions) => Promise<Reachability>;
}

/**
 * Owns the single current node and its lifetime, and drives startup:
 * open or create the repository, build the node, optionally probe and fall back
 * to a relay, then launch bootstrap dials without waiting for them.
 */
export class SwarmSupervisor {
	private readonly store: RepositoryStore;
	private readonly factory: NodeFactory;
	private readonly probe: NonNullable<SwarmSupervisorDeps['probe']>;
	private root: AbortController | undefined;
	private active: ActiveNode | undefined;
	private peering: PeeringService | undefined;
	private reconfigurer: RelayReconfigurer | undefined;
	private bootstrap: Promise<DialOutcome[]> | undefined;

	constructor(deps: SwarmSupervisorDeps = {}) {
		this.store = deps.store ?? new RepositoryStore();
		this.factory = deps.factory ?? new Libp2pNodeFactory(this.store);
		this.probe = deps.probe ?? probeReachability;
	}

	get mode(): SwarmMode {
		return this.reconfigurer?.mode ?? 'direct';
	}

	get view(): SwarmView {
		const self = this;
		return {
			get peerId() { return self.requireActive().node.peerId; },
			get mode() { return self.mode; },
			get daemon() { return self.requireActive().node.daemon; },
			get bootstrapped() { return self.bootstrap ?? Promise.resolve([]); },
			addresses: () => self.requireActive().node.getMultiaddrs().map(ma => ma.toString()),
			storageUsage: () => self.requireActive().node.storageUsage()
		};
	}

	get peeringService(): PeeringService | undefined {
		return this.peering;
	}

	async init(options: SwarmInitOptions): Promise<SwarmView> {
		if (this.root != null) {
			throw new InvalidTransitionError('swarm supervisor is already initialized');
		}
		const root = new AbortController();
		this.root = root;

		try {
			const repo = await this.openOrCreate(options.path, options.createOptions);
			const lifetime = createLifetime(root.signal);
			try {
				this.active = { node: await this.factory.build(repo, lifetime.signal), lifetime };
			} catch (err) {
				lifetime.abort();
				throw err;
			}
			this.reconfigurer = new RelayReconfigurer({
				store: this.store,
				factory: this.factory,
				relayAddress: options.relayAddress,
				settleMs: options.settleMs,
				peering: options.peering
			});

			if (options.online) {
				await this.checkReachability(this.active, this.reconfigurer, options, root.signal);
			}
		} catch (err) {
			logError('startup failed - %o', err);
			await this.stop();
			throw err;
		}

		this.launchBootstrap(options);
		return this.view;
	}

	async stop(): Promise<void> {
		this.root?.abort();
		await this.peering?.stop();
		await this.active?.node.stop();
	}

	private async checkReachability(active: ActiveNode, reconfigurer: RelayReconfigurer, options: SwarmInitOptions, signal: AbortSignal): Promise<void> {
		const reachability = await this.probe(active.node, { graceMs: options.graceMs, signal: active.lifetime.signal });
		log('node %s classified %s', active.node.peerId, reachability);
		if (reachability === 'reachable') return;

		const relayed = await reconfigurer.transition(active, signal);
		this.active = { node: relayed.node, lifetime: relayed.lifetime };
		this.peering = relayed.peering;
	}

	private launchBootstrap(options: SwarmInitOptions): void {
		const { node, lifetime } = this.requireActive();
		const peers = options.introductionPeers ?? INTRODUCTION_PEERS;
		const batch = connectToPeers(node, peers, { signal: lifetime.signal, timeoutMs: options.dialTimeoutMs });
		batch.catch((err: unknown) => { logError('bootstrap batch rejected - %o', err); });
		this.bootstrap = node.track(batch);
	}

	private async openOrCreate(repoPath: string, createOptions?: CreateRepoOptions): Promise<Repository> {
		try {
			return await this.store.open(repoPath);
		} catch (err) {
			if (err instanceof NotInitializedError) {
				log('no repository at %s, creating one', repoPath);
				return this.store.create(repoPath, createOptions);
			}
			if (err instanceof NeedsMigrationError) {
				log('repository %s needs migration %d -> %d', repoPath, err.found, err.expected);
				await this.store.migrate(repoPath);
				return this.store.open(repoPath);
			}
			throw err;
		}
	}

	private requireActive(): ActiveNode {
		if (this.active == null) {
			throw new InvalidTransitionError('no node is running');
		}
		return this.active;
	}
}
