import { promises as fs } from 'fs';
import * as path from 'path';
import lockfile from 'proper-lockfile';
import { generateKeyPair, privateKeyToProtobuf } from '@libp2p/crypto/keys';
import { peerIdFromPrivateKey } from '@libp2p/peer-id';
import { toString as u8ToString } from 'uint8arrays/to-string';
import type { PrivateKey } from '@libp2p/interface';
import { DEFAULT_BOOTSTRAP_PEERS, DEFAULT_SWARM_ADDRESSES } from '../constants.js';
import {
	MigrationError,
	NeedsMigrationError,
	NotInitializedError,
	RepoIOError,
	describeCause,
	isErrnoException
} from '../errors.js';
import { createLogger } from '../logger.js';
import { REPO_VERSION, RepoConfigSchema, defaultConfig, type RepoConfig, type RoutingType } from './config.js';
import { RawConfigSchema, planMigrations, type Migration } from './migrations.js';

const log = createLogger('repo');

const CONFIG_FILE = 'config';
const VERSION_FILE = 'version';
const LOCK_FILE = 'repo.lock';

/** RSA modulus size for generated identities. */
export const IDENTITY_KEY_BITS = 2048;

export interface Repository {
	readonly path: string;
	readonly version: number;
	readonly config: RepoConfig;
}

export interface CreateRepoOptions {
	/** Defaults to RSA; Ed25519 produces shorter ids and is much faster to generate. */
	keyType?: 'RSA' | 'Ed25519';
	swarmAddresses?: readonly string[];
	bootstrapPeers?: readonly string[];
}

export type ReleaseLock = () => Promise<void>;

export class RepositoryStore {
	constructor(private readonly migrations?: readonly Migration[]) { }

	async isInitialized(repoPath: string): Promise<boolean> {
		return fs.access(path.join(repoPath, CONFIG_FILE))
			.then(() => true, () => false);
	}

	async open(repoPath: string): Promise<Repository> {
		const raw = await this.readFileIfExists(path.join(repoPath, CONFIG_FILE));
		if (raw == null) {
			throw new NotInitializedError(repoPath);
		}
		const version = await this.readVersion(repoPath);
		if (version !== REPO_VERSION) {
			throw new NeedsMigrationError(version, REPO_VERSION);
		}
		return { path: repoPath, version, config: this.parseConfig(repoPath, raw) };
	}

	/** Upgrades the on-disk format to {@link REPO_VERSION}; a no-op when already current. */
	async migrate(repoPath: string): Promise<void> {
		const version = await this.readVersion(repoPath);
		if (version === REPO_VERSION) {
			log('migrate: %s already at version %d', repoPath, version);
			return;
		}
		const plan = planMigrations(version, REPO_VERSION, this.migrations);

		if (await this.isLocked(repoPath)) {
			throw new MigrationError(`cannot migrate ${repoPath} while a node holds it`);
		}

		const raw = await this.readFileIfExists(path.join(repoPath, CONFIG_FILE));
		if (raw == null) {
			throw new NotInitializedError(repoPath);
		}

		let config: Record<string, unknown>;
		try {
			config = RawConfigSchema.parse(JSON.parse(raw));
		} catch (err) {
			throw new MigrationError(`config at ${repoPath} is not a JSON object`, { cause: err });
		}

		for (const step of plan) {
			log('migrate: %s %d -> %d (%s)', repoPath, step.from, step.to, step.description);
			try {
				config = step.apply(config);
			} catch (err) {
				throw new MigrationError(`migration ${step.from} -> ${step.to} failed: ${describeCause(err)}`, { cause: err });
			}
		}

		const result = RepoConfigSchema.safeParse(config);
		if (!result.success) {
			throw new MigrationError(`migrated config is invalid: ${result.error.message}`, { cause: result.error });
		}

		try {
			await this.writeConfig(repoPath, result.data);
			await this.writeAtomic(path.join(repoPath, VERSION_FILE), `${REPO_VERSION}\n`);
		} catch (err) {
			throw new MigrationError(`failed to write migrated repository at ${repoPath}`, { cause: err });
		}
	}

	async create(repoPath: string, options: CreateRepoOptions = {}): Promise<Repository> {
		await this.ensureEmptyDirectory(repoPath);

		const key = await this.generateIdentityKey(options.keyType ?? 'RSA');
		const identity = {
			PeerID: peerIdFromPrivateKey(key).toString(),
			PrivKey: u8ToString(privateKeyToProtobuf(key), 'base64pad')
		};
		const config = defaultConfig(
			identity,
			options.swarmAddresses ?? DEFAULT_SWARM_ADDRESSES,
			options.bootstrapPeers ?? DEFAULT_BOOTSTRAP_PEERS
		);

		try {
			for (const mount of config.Datastore.Spec.mounts) {
				await fs.mkdir(path.join(repoPath, mount.path), { recursive: true });
			}
			await this.writeConfig(repoPath, config);
			await this.writeAtomic(path.join(repoPath, VERSION_FILE), `${REPO_VERSION}\n`);
		} catch (err) {
			throw new RepoIOError(`failed to initialize repository at ${repoPath}`, { cause: err });
		}

		log('created repository %s for peer %s', repoPath, identity.PeerID);
		return { path: repoPath, version: REPO_VERSION, config };
	}

	/**
	 * Rewrites the announce list and routing mode, leaving the rest of the config intact.
	 * Only valid while no node holds the repository.
	 */
	async setAnnounceAddresses(repoPath: string, addresses: readonly string[], routing: RoutingType = 'dhtserver'): Promise<void> {
		if (await this.isLocked(repoPath)) {
			throw new RepoIOError(`repository ${repoPath} is held by a running node`);
		}
		const { config } = await this.open(repoPath);
		const updated: RepoConfig = {
			...config,
			Addresses: { ...config.Addresses, Announce: Array.from(new Set(addresses)) },
			Routing: { ...config.Routing, Type: routing }
		};
		try {
			await this.writeConfig(repoPath, updated);
		} catch (err) {
			throw new RepoIOError(`failed to write announce addresses to ${repoPath}`, { cause: err });
		}
		log('announce addresses for %s set to %o (routing %s)', repoPath, updated.Addresses.Announce, routing);
	}

	async config(repoPath: string): Promise<RepoConfig> {
		return (await this.open(repoPath)).config;
	}

	/** Peer id persisted in the repository; does not start a node. */
	async identity(repoPath: string): Promise<string> {
		return (await this.config(repoPath)).Identity.PeerID;
	}

	async lock(repoPath: string): Promise<ReleaseLock> {
		try {
			return await lockfile.lock(repoPath, {
				lockfilePath: path.join(repoPath, LOCK_FILE),
				stale: 10_000,
				update: 5_000,
				onCompromised: (err) => { log.extend('error')('lock on %s compromised - %o', repoPath, err); }
			});
		} catch (err) {
			throw new RepoIOError(`repository ${repoPath} is already in use`, { cause: err });
		}
	}

	async isLocked(repoPath: string): Promise<boolean> {
		return lockfile.check(repoPath, { lockfilePath: path.join(repoPath, LOCK_FILE) })
			.catch((err: unknown) => {
				if (isErrnoException(err) && err.code === 'ENOENT') return false;
				throw new RepoIOError(`failed to check lock on ${repoPath}`, { cause: err });
			});
	}

	private async generateIdentityKey(keyType: 'RSA' | 'Ed25519'): Promise<PrivateKey> {
		return keyType === 'Ed25519'
			? generateKeyPair('Ed25519')
			: generateKeyPair('RSA', IDENTITY_KEY_BITS);
	}

	private parseConfig(repoPath: string, raw: string): RepoConfig {
		let json: unknown;
		try {
			json = JSON.parse(raw);
		} catch (err) {
			throw new RepoIOError(`config at ${repoPath} is not valid JSON`, { cause: err });
		}
		const result = RepoConfigSchema.safeParse(json);
		if (!result.success) {
			throw new RepoIOError(`config at ${repoPath} is invalid: ${result.error.message}`, { cause: result.error });
		}
		return result.data;
	}

	private async readVersion(repoPath: string): Promise<number> {
		const raw = await this.readFileIfExists(path.join(repoPath, VERSION_FILE));
		if (raw == null) {
			if (await this.isInitialized(repoPath)) {
				throw new RepoIOError(`repository ${repoPath} has no version file`);
			}
			throw new NotInitializedError(repoPath);
		}
		const version = Number.parseInt(raw.trim(), 10);
		if (!Number.isInteger(version) || version < 1) {
			throw new RepoIOError(`repository ${repoPath} has an unreadable version "${raw.trim()}"`);
		}
		return version;
	}

	private async ensureEmptyDirectory(repoPath: string): Promise<void> {
		const entries = await fs.readdir(repoPath)
			.catch((err: unknown) => {
				if (isErrnoException(err) && err.code === 'ENOENT') return undefined;
				throw new RepoIOError(`cannot initialize repository at ${repoPath}`, { cause: err });
			});
		if (entries == null) {
			await fs.mkdir(repoPath, { recursive: true })
				.catch((err: unknown) => { throw new RepoIOError(`failed to create ${repoPath}`, { cause: err }); });
			return;
		}
		if (entries.length > 0) {
			throw new RepoIOError(`cannot initialize repository at ${repoPath}: directory is not empty`);
		}
	}

	private async readFileIfExists(filePath: string): Promise<string | undefined> {
		return fs.readFile(filePath, 'utf-8')
			.catch((err: unknown) => {
				if (isErrnoException(err) && err.code === 'ENOENT') return undefined;
				throw new RepoIOError(`failed to read ${filePath}`, { cause: err });
			});
	}

	private async writeConfig(repoPath: string, config: RepoConfig): Promise<void> {
		await this.writeAtomic(path.join(repoPath, CONFIG_FILE), `${JSON.stringify(config, null, 2)}\n`);
	}

	private async writeAtomic(filePath: string, content: string): Promise<void> {
		const tmp = `${filePath}.tmp`;
		await fs.writeFile(tmp, content);
		await fs.rename(tmp, filePath);
	}
}
