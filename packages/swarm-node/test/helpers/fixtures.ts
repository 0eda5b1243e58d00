import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { generateKeyPair } from '@libp2p/crypto/keys';
import { peerIdFromPrivateKey } from '@libp2p/peer-id';
import { multiaddr, type Multiaddr } from '@multiformats/multiaddr';
import type { AbortOptions, PeerData, PeerId } from '@libp2p/interface';
import type { NodeFactory, NodeHandle } from '../../src/node/node-handle.js';
import { REPO_VERSION, defaultConfig } from '../../src/repo/config.js';
import type { Repository } from '../../src/repo/repo-store.js';

export async function makeTempDir(prefix = 'waypost-'): Promise<{ dir: string, cleanup: () => Promise<void> }> {
	const dir = await mkdtemp(path.join(tmpdir(), prefix));
	return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

export async function randomPeerId(): Promise<PeerId> {
	return peerIdFromPrivateKey(await generateKeyPair('Ed25519'));
}

export type DialImpl = (peer: PeerId | Multiaddr[], options?: AbortOptions) => Promise<unknown>;

/** Resolves when the signal aborts, rejecting with its reason; never connects. */
export const hangUntilAborted: DialImpl = async (_peer, options) => {
	await new Promise<never>((_resolve, reject) => {
		const signal = options?.signal;
		if (signal == null) return;
		if (signal.aborted) { reject(signal.reason); return; }
		signal.addEventListener('abort', () => { reject(signal.reason); }, { once: true });
	});
};

export class FakeNode implements NodeHandle {
	readonly daemon = true;
	readonly dials: Array<PeerId | Multiaddr[]> = [];
	readonly merged: Array<{ peerId: string, data: PeerData }> = [];
	readonly connected = new Set<string>();
	stopped = false;
	private readonly tasks = new Set<Promise<unknown>>();

	readonly peerStore = {
		merge: async (peerId: PeerId, data: PeerData): Promise<void> => {
			this.events.push(`merge:${peerId.toString()}`);
			this.merged.push({ peerId: peerId.toString(), data });
		}
	};

	constructor(
		readonly repo: Repository,
		readonly signal: AbortSignal,
		private readonly addrs: string[],
		private readonly events: string[],
		private readonly dialImpl: DialImpl = async () => undefined
	) {
		signal.addEventListener('abort', () => { events.push(`abort:${this.label}`); }, { once: true });
	}

	get peerId(): string {
		return this.repo.config.Identity.PeerID;
	}

	/** Distinguishes the direct node from its relayed replacement in event logs. */
	get label(): string {
		return this.repo.config.Addresses.Announce.length > 0 ? 'relayed' : 'direct';
	}

	getMultiaddrs(): Multiaddr[] {
		return this.addrs.map(a => multiaddr(a));
	}

	getConnections(peerId?: PeerId): unknown[] {
		return peerId != null && this.connected.has(peerId.toString()) ? [{ remotePeer: peerId }] : [];
	}

	async dial(peer: PeerId | Multiaddr[], options?: AbortOptions): Promise<unknown> {
		this.dials.push(peer);
		return this.dialImpl(peer, options);
	}

	async storageUsage(): Promise<number> {
		return 0;
	}

	track<T>(task: Promise<T>): Promise<T> {
		this.tasks.add(task);
		return task;
	}

	async stop(): Promise<void> {
		if (this.stopped) return;
		this.stopped = true;
		await Promise.allSettled([...this.tasks]);
		this.events.push(`stop:${this.label}`);
	}
}

/** Hands out fake nodes; each build takes the next address list from `addresses`. */
export class FakeFactory implements NodeFactory {
	readonly built: FakeNode[] = [];

	constructor(
		private readonly addresses: string[][],
		readonly events: string[] = [],
		private readonly dialImpl?: DialImpl
	) { }

	async build(repo: Repository, signal: AbortSignal): Promise<FakeNode> {
		const node = new FakeNode(repo, signal, this.addresses[this.built.length] ?? [], this.events, this.dialImpl);
		this.events.push(`build:${node.label}`);
		this.built.push(node);
		return node;
	}
}

/** An in-memory repository record for code that never touches the disk. */
export async function fakeRepo(repoPath = '/nonexistent/repo', announce: string[] = []): Promise<Repository> {
	const id = await randomPeerId();
	const config = defaultConfig({ PeerID: id.toString(), PrivKey: 'unused' }, ['/ip4/127.0.0.1/tcp/0'], []);
	config.Addresses.Announce = announce;
	return { path: repoPath, version: REPO_VERSION, config };
}

export const delay = async (ms: number): Promise<void> => {
	await new Promise<void>(resolve => setTimeout(resolve, ms));
};
