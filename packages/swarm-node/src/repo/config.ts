import { z } from 'zod';

/** On-disk format version this build reads and writes. */
export const REPO_VERSION = 3;

export const DEFAULT_STORAGE_MAX = '1000TB';
export const DEFAULT_REPROVIDER_INTERVAL = '1h';

export const RoutingTypeSchema = z.enum(['dhtserver', 'dht', 'dhtclient', 'none']);
export type RoutingType = z.infer<typeof RoutingTypeSchema>;

const MountSchema = z.object({
	mountpoint: z.string(),
	type: z.enum(['flatfs', 'levelds']),
	path: z.string()
}).passthrough();

export type DatastoreMount = z.infer<typeof MountSchema>;

const DatastoreSpecSchema = z.object({
	type: z.literal('measure'),
	prefix: z.string(),
	mounts: z.array(MountSchema).min(1)
}).passthrough();

/** Unknown keys pass through at every level and are written back unchanged. */
export const RepoConfigSchema = z.object({
	Identity: z.object({
		PeerID: z.string().min(1),
		PrivKey: z.string().min(1)
	}).passthrough(),
	Addresses: z.object({
		Swarm: z.array(z.string()),
		Announce: z.array(z.string())
	}).passthrough(),
	Routing: z.object({
		Type: RoutingTypeSchema
	}).passthrough(),
	Datastore: z.object({
		StorageMax: z.string(),
		Spec: DatastoreSpecSchema
	}).passthrough(),
	Reprovider: z.object({
		Strategy: z.enum(['all', 'pinned', 'roots']),
		Interval: z.string()
	}).passthrough(),
	Experimental: z.object({
		FilestoreEnabled: z.boolean()
	}).passthrough(),
	Bootstrap: z.array(z.string())
}).passthrough();

export type RepoConfig = z.infer<typeof RepoConfigSchema>;

export const defaultDatastoreSpec = (): RepoConfig['Datastore']['Spec'] => ({
	type: 'measure',
	prefix: 'waypost.datastore',
	mounts: [
		{ mountpoint: '/blocks', type: 'flatfs', path: 'blocks' },
		{ mountpoint: '/', type: 'levelds', path: 'datastore' }
	]
});

/** Builds the configuration written by `create`. */
export function defaultConfig(identity: RepoConfig['Identity'], swarm: readonly string[], bootstrap: readonly string[]): RepoConfig {
	return {
		Identity: identity,
		Addresses: {
			Swarm: [...swarm],
			Announce: []
		},
		Routing: { Type: 'dhtserver' },
		Datastore: {
			StorageMax: DEFAULT_STORAGE_MAX,
			Spec: defaultDatastoreSpec()
		},
		Reprovider: {
			Strategy: 'roots',
			Interval: DEFAULT_REPROVIDER_INTERVAL
		},
		Experimental: { FilestoreEnabled: true },
		Bootstrap: [...bootstrap]
	};
}
