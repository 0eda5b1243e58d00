import { z } from 'zod';
import { MigrationError } from '../errors.js';
import { DEFAULT_REPROVIDER_INTERVAL, DEFAULT_STORAGE_MAX, defaultDatastoreSpec } from './config.js';

export type RawConfig = Record<string, unknown>;

export const RawConfigSchema = z.record(z.unknown());

export interface Migration {
	from: number;
	to: number;
	description: string;
	apply(config: RawConfig): RawConfig;
}

function section(config: RawConfig, key: string): RawConfig {
	const parsed = RawConfigSchema.safeParse(config[key]);
	return parsed.success ? { ...parsed.data } : {};
}

export const MIGRATIONS: readonly Migration[] = [
	{
		from: 1,
		to: 2,
		description: 'announce address list and routing mode',
		apply(config) {
			const addresses = section(config, 'Addresses');
			const announce = addresses['Announce'];
			// v1 stored at most one announce address as a bare string
			addresses['Announce'] = typeof announce === 'string'
				? [announce]
				: Array.isArray(announce) ? announce : [];
			if (!Array.isArray(addresses['Swarm'])) addresses['Swarm'] = [];

			const routing = section(config, 'Routing');
			routing['Type'] ??= 'dhtserver';

			return { ...config, Addresses: addresses, Routing: routing };
		}
	},
	{
		from: 2,
		to: 3,
		description: 'reprovider and experimental sections, size string storage ceiling',
		apply(config) {
			const datastore = section(config, 'Datastore');
			const storageMax = datastore['StorageMax'];
			if (typeof storageMax === 'number') {
				datastore['StorageMax'] = `${storageMax}B`;
			} else if (typeof storageMax !== 'string') {
				datastore['StorageMax'] = DEFAULT_STORAGE_MAX;
			}
			datastore['Spec'] ??= defaultDatastoreSpec();

			const reprovider = section(config, 'Reprovider');
			reprovider['Strategy'] ??= 'roots';
			reprovider['Interval'] ??= DEFAULT_REPROVIDER_INTERVAL;

			const experimental = section(config, 'Experimental');
			experimental['FilestoreEnabled'] ??= true;

			const bootstrap = Array.isArray(config['Bootstrap']) ? config['Bootstrap'] : [];

			return {
				...config,
				Datastore: datastore,
				Reprovider: reprovider,
				Experimental: experimental,
				Bootstrap: bootstrap
			};
		}
	}
];

/**
 * Returns the ordered steps that take a repository from `from` to `to`.
 * Throws when the chain has a gap or the target is older than the source.
 */
export function planMigrations(from: number, to: number, migrations: readonly Migration[] = MIGRATIONS): Migration[] {
	if (from > to) {
		throw new MigrationError(`repository version ${from} is newer than supported version ${to}; refusing to downgrade`);
	}
	const plan: Migration[] = [];
	let version = from;
	while (version < to) {
		const step = migrations.find(m => m.from === version);
		if (step == null) {
			throw new MigrationError(`no migration registered from version ${version}`);
		}
		plan.push(step);
		version = step.to;
	}
	return plan;
}
