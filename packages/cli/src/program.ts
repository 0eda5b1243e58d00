import * as path from 'path';
import { Command } from 'commander';
import debug from 'debug';
import {
	RepositoryStore,
	StorageMonitor,
	SwarmSupervisor,
	type DialOutcome,
	type SwarmSupervisorDeps
} from '@waypost/swarm-node';

const log = debug('waypost:cli');

export const REPO_PATH_ENV = 'WAYPOST_PATH';

/** Where the CLI writes and what it waits on; the entry point binds these to the process. */
export interface CliIO {
	out(line: string): void;
	err(line: string): void;
	env: Record<string, string | undefined>;
	homedir: string;
	/** Resolves when a running daemon should stop. */
	shutdown(): Promise<void>;
	/** Overrides for the daemon's collaborators. */
	deps?: SwarmSupervisorDeps;
}

type GlobalOptions = { repo?: string };

/** `--repo`, then `$WAYPOST_PATH`, then `~/.waypost/swarm`. */
export function resolveRepoPath(flag: string | undefined, io: Pick<CliIO, 'env' | 'homedir'>): string {
	return path.resolve(flag ?? io.env[REPO_PATH_ENV] ?? path.join(io.homedir, '.waypost', 'swarm'));
}

function reportBootstrap(io: CliIO, outcomes: DialOutcome[]): void {
	const failed = outcomes.filter(o => o.error != null);
	io.out(`bootstrap: ${outcomes.length - failed.length} connected, ${failed.length} failed`);
	for (const outcome of failed) {
		io.err(`  ${outcome.error?.message ?? outcome.peerId}`);
	}
}

export function createProgram(io: CliIO): Command {
	const store = io.deps?.store ?? new RepositoryStore();
	const repoPath = (command: Command): string => resolveRepoPath(command.optsWithGlobals<GlobalOptions>().repo, io);

	const program = new Command()
		.name('waypost')
		.description('Swarm node with reachability detection and relay fallback')
		.version('0.1.0')
		.option('--repo <path>', `repository directory (default: $${REPO_PATH_ENV} or ~/.waypost/swarm)`);

	program
		.command('init')
		.description('Create a repository with a fresh identity')
		.option('--ed25519', 'use an Ed25519 identity instead of RSA')
		.action(async (options: { ed25519?: boolean }, command: Command) => {
			const target = repoPath(command);
			const repo = await store.create(target, { keyType: options.ed25519 === true ? 'Ed25519' : 'RSA' });
			io.out(`initialized repository at ${repo.path}`);
			io.out(`peer id: ${repo.config.Identity.PeerID}`);
		});

	program
		.command('id')
		.description('Print the peer id recorded in the repository')
		.action(async (_options: unknown, command: Command) => {
			io.out(await store.identity(repoPath(command)));
		});

	program
		.command('repo')
		.description('Repository maintenance')
		.command('stat')
		.description('Print datastore usage against the configured ceiling, in bytes')
		.action(async (_options: unknown, command: Command) => {
			const repo = await store.open(repoPath(command));
			const { used, total, available } = await new StorageMonitor(repo).getCapacity();
			io.out(`used: ${used}`);
			io.out(`total: ${total}`);
			io.out(`available: ${available}`);
		});

	program
		.command('daemon')
		.description('Run the node until interrupted')
		.option('--offline', 'skip the reachability probe and stay in direct mode')
		.option('--relay <address>', 'relay to fall back to, including its /p2p/ id')
		.option('--no-introduce', 'do not dial the introduction peers')
		.action(async (options: { offline?: boolean, relay?: string, introduce: boolean }, command: Command) => {
			const target = repoPath(command);
			const supervisor = new SwarmSupervisor({ ...io.deps, store });
			log('starting daemon on %s', target);

			const view = await supervisor.init({
				path: target,
				online: options.offline !== true,
				relayAddress: options.relay,
				introductionPeers: options.introduce ? undefined : []
			});
			io.out(`peer id: ${view.peerId}`);
			io.out(`mode: ${view.mode}`);
			for (const addr of view.addresses()) {
				io.out(`listening on ${addr}`);
			}
			const report = view.bootstrapped.then(
				outcomes => { reportBootstrap(io, outcomes); },
				(err: unknown) => { io.err(`bootstrap failed: ${err instanceof Error ? err.message : String(err)}`); }
			);

			await io.shutdown();
			log('shutting down');
			await supervisor.stop();
			await report;
			io.out('stopped');
		});

	return program;
}
