import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { expect, use } from 'chai';
import chaiAsPromised from 'chai-as-promised';
import { NotInitializedError, RepoIOError, RepositoryStore } from '@waypost/swarm-node';
import { createProgram, resolveRepoPath, type CliIO } from '../src/program.js';

use(chaiAsPromised);

describe('waypost cli', () => {
	let dir: string;
	let repoPath: string;
	let out: string[];
	let err: string[];

	const io = (overrides: Partial<CliIO> = {}): CliIO => ({
		out: line => { out.push(line); },
		err: line => { err.push(line); },
		env: {},
		homedir: dir,
		shutdown: async () => undefined,
		...overrides
	});

	const run = async (args: string[], cli: CliIO = io()): Promise<void> => {
		const program = createProgram(cli).exitOverride();
		await program.parseAsync(args, { from: 'user' });
	};

	beforeEach(async () => {
		dir = await mkdtemp(path.join(tmpdir(), 'waypost-cli-'));
		repoPath = path.join(dir, 'repo');
		out = [];
		err = [];
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	describe('resolveRepoPath', () => {
		it('prefers the flag', () => {
			expect(resolveRepoPath('/tmp/flag', { env: { WAYPOST_PATH: '/tmp/env' }, homedir: '/home/u' })).to.equal('/tmp/flag');
		});

		it('falls back to the environment', () => {
			expect(resolveRepoPath(undefined, { env: { WAYPOST_PATH: '/tmp/env' }, homedir: '/home/u' })).to.equal('/tmp/env');
		});

		it('defaults under the home directory', () => {
			expect(resolveRepoPath(undefined, { env: {}, homedir: '/home/u' })).to.equal('/home/u/.waypost/swarm');
		});
	});

	it('initializes a repository and reads its id back', async () => {
		await run(['init', '--ed25519', '--repo', repoPath]);

		const id = await new RepositoryStore().identity(repoPath);
		expect(out).to.deep.equal([`initialized repository at ${repoPath}`, `peer id: ${id}`]);

		out = [];
		await run(['id', '--repo', repoPath]);
		expect(out).to.deep.equal([id]);
	});

	it('takes the repository from the environment', async () => {
		await run(['init', '--ed25519'], io({ env: { WAYPOST_PATH: repoPath } }));
		expect(out[0]).to.equal(`initialized repository at ${repoPath}`);
	});

	it('will not initialize over an existing repository', async () => {
		await run(['init', '--ed25519', '--repo', repoPath]);
		await expect(run(['init', '--ed25519', '--repo', repoPath])).to.be.rejectedWith(RepoIOError);
	});

	it('reports a missing repository', async () => {
		await expect(run(['id', '--repo', repoPath])).to.be.rejectedWith(NotInitializedError);
	});

	it('prints storage usage', async () => {
		await run(['init', '--ed25519', '--repo', repoPath]);
		out = [];

		await run(['repo', 'stat', '--repo', repoPath]);

		expect(out).to.deep.equal(['used: 0', 'total: 1000000000000000', 'available: 1000000000000000']);
	});

	it('runs the daemon until shutdown', async () => {
		const store = new RepositoryStore();
		const repo = await store.create(repoPath, { keyType: 'Ed25519', swarmAddresses: ['/ip4/127.0.0.1/tcp/0'], bootstrapPeers: [] });
		await store.setAnnounceAddresses(repoPath, [], 'none');

		await run(['daemon', '--offline', '--no-introduce', '--repo', repoPath]);

		const id = repo.config.Identity.PeerID;
		expect(out[0]).to.equal(`peer id: ${id}`);
		expect(out[1]).to.equal('mode: direct');
		expect(out[2]).to.match(new RegExp(`^listening on /ip4/127\\.0\\.0\\.1/tcp/\\d+/p2p/${id}$`));
		expect(out.slice(3)).to.deep.equal(['bootstrap: 0 connected, 0 failed', 'stopped']);
		expect(err).to.deep.equal([]);
		expect(await store.isLocked(repoPath)).to.equal(false);
	});

	it('probes reachability unless told to stay offline', async () => {
		const store = new RepositoryStore();
		await store.create(repoPath, { keyType: 'Ed25519', swarmAddresses: ['/ip4/127.0.0.1/tcp/0'], bootstrapPeers: [] });
		await store.setAnnounceAddresses(repoPath, [], 'none');
		const probed: string[] = [];

		await run(['daemon', '--no-introduce', '--repo', repoPath], io({
			deps: {
				probe: async node => {
					probed.push(...node.getMultiaddrs().map(ma => ma.toString()));
					return 'reachable';
				}
			}
		}));

		expect(probed).to.have.length(1);
		expect(out[1]).to.equal('mode: direct');
		expect(out.at(-1)).to.equal('stopped');
	});
});
