import { promises as fs } from 'fs';
import * as path from 'path';
import { RepoIOError, isErrnoException } from '../errors.js';
import type { DatastoreMount } from '../repo/config.js';
import type { Repository } from '../repo/repo-store.js';

export interface StorageCapacity {
	total: number;
	used: number;
	available: number;
}

const UNITS: Record<string, number> = {
	B: 1,
	KB: 1e3,
	MB: 1e6,
	GB: 1e9,
	TB: 1e12
};

/** Parses a `StorageMax` string such as `10GB` or `512MB` (SI units) into bytes. */
export function parseStorageMax(text: string): number {
	const match = /^\s*(\d+(?:\.\d+)?)\s*([KMGT]?B)\s*$/i.exec(text);
	const unit = match?.[2] != null ? UNITS[match[2].toUpperCase()] : undefined;
	if (match?.[1] == null || unit == null) {
		throw new RepoIOError(`invalid storage size "${text}"`);
	}
	return Math.floor(Number(match[1]) * unit);
}

/**
 * Measures the datastore mounts of a repository against its configured ceiling.
 */
export class StorageMonitor {
	private readonly mounts: readonly DatastoreMount[];
	private readonly storageMax: string;

	constructor(private readonly repo: Repository) {
		this.mounts = repo.config.Datastore.Spec.mounts;
		this.storageMax = repo.config.Datastore.StorageMax;
	}

	async getCapacity(): Promise<StorageCapacity> {
		const total = parseStorageMax(this.storageMax);
		const used = await this.getUsage();
		return {
			total,
			used,
			available: Math.max(0, total - used)
		};
	}

	/** Aggregate bytes on disk across all mounts. */
	async getUsage(): Promise<number> {
		let used = 0;
		for (const mount of this.mounts) {
			used += await this.measure(path.resolve(this.repo.path, mount.path));
		}
		return used;
	}

	private async measure(dir: string): Promise<number> {
		const entries = await fs.readdir(dir, { withFileTypes: true })
			.catch((err: unknown) => {
				// an unused mount has no directory yet
				if (isErrnoException(err) && err.code === 'ENOENT') return [];
				throw new RepoIOError(`failed to measure ${dir}`, { cause: err });
			});

		let total = 0;
		for (const entry of entries) {
			const full = path.join(dir, entry.name);
			if (entry.isDirectory()) {
				total += await this.measure(full);
			} else if (entry.isFile()) {
				const stat = await fs.stat(full)
					.catch((err: unknown) => { throw new RepoIOError(`failed to stat ${full}`, { cause: err }); });
				total += stat.size;
			}
		}
		return total;
	}
}
