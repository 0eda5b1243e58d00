import { setTimeout as sleep } from 'node:timers/promises';
import { parsePeerAddresses } from '../bootstrap/peer-bootstrapper.js';
import { DEFAULT_RELAY_ADDRESS, SETTLE_PERIOD_MS } from '../constants.js';
import { InvalidTransitionError } from '../errors.js';
import { createLifetime } from '../lifetime.js';
import { createLogger } from '../logger.js';
import type { NodeFactory, NodeHandle } from '../node/node-handle.js';
import { PeeringService, type PeeringServiceInit } from '../peering/peering-service.js';
import type { RepositoryStore } from '../repo/repo-store.js';
import { circuitAddress } from './circuit.js';

const log = createLogger('relay');

export type SwarmMode = 'direct' | 'relayed';

export interface ActiveNode {
	node: NodeHandle;
	lifetime: AbortController;
}

export interface RelayedNode extends ActiveNode {
	peering: PeeringService;
}

export interface RelayReconfigurerInit {
	store: Pick<RepositoryStore, 'open' | 'setAnnounceAddresses'>;
	factory: NodeFactory;
	/** Relay multiaddr including its `/p2p/<id>` component. */
	relayAddress?: string;
	settleMs?: number;
	peering?: PeeringServiceInit;
}

/**
 * One-way Direct -> Relayed transition. The current node is fully stopped before
 * the repository is rewritten, and the replacement is built only after the settle
 * period has let the old listener's port go.
 */
export class RelayReconfigurer {
	private current: SwarmMode = 'direct';
	private attempted = false;
	private readonly relayAddress: string;
	private readonly settleMs: number;

	constructor(private readonly init: RelayReconfigurerInit) {
		this.relayAddress = init.relayAddress ?? DEFAULT_RELAY_ADDRESS;
		this.settleMs = init.settleMs ?? SETTLE_PERIOD_MS;
	}

	get mode(): SwarmMode {
		return this.current;
	}

	/**
	 * @param active - the direct-mode node; its lifetime is aborted here
	 * @param parent - process-wide lifetime; aborting it unwinds the settle wait and the new node
	 */
	async transition(active: ActiveNode, parent?: AbortSignal): Promise<RelayedNode> {
		if (this.attempted) {
			throw new InvalidTransitionError(`relay transition already ${this.current === 'relayed' ? 'completed' : 'attempted'}`);
		}
		this.attempted = true;

		const [relay] = parsePeerAddresses([this.relayAddress]);
		if (relay == null) {
			throw new InvalidTransitionError('no relay address configured');
		}
		const repo = active.node.repo;
		const selfId = repo.config.Identity.PeerID;

		log('stopping direct node %s', selfId);
		active.lifetime.abort();
		await active.node.stop();

		const announce = circuitAddress(this.relayAddress, selfId);
		await this.init.store.setAnnounceAddresses(repo.path, [announce]);
		log('announce address set to %s', announce);

		await sleep(this.settleMs, undefined, { signal: parent });

		const updated = await this.init.store.open(repo.path);
		const lifetime = createLifetime(parent);
		let node: NodeHandle;
		try {
			node = await this.init.factory.build(updated, lifetime.signal);
		} catch (err) {
			lifetime.abort();
			throw err;
		}

		const peering = new PeeringService(node, this.init.peering);
		try {
			await peering.addPeer(relay.id, relay.addrs);
			await peering.start();
		} catch (err) {
			lifetime.abort();
			await peering.stop();
			await node.stop();
			throw err;
		}

		this.current = 'relayed';
		log('node %s now reachable via relay %s', node.peerId, relay.id);
		return { node, lifetime, peering };
	}
}
