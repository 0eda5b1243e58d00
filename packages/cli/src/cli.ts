#!/usr/bin/env node
import { homedir } from 'os';
import { createProgram } from './program.js';

const shutdown = (): Promise<void> => new Promise(resolve => {
	process.once('SIGINT', () => { resolve(); });
	process.once('SIGTERM', () => { resolve(); });
});

const program = createProgram({
	out: line => { console.log(line); },
	err: line => { console.error(line); },
	env: process.env,
	homedir: homedir(),
	shutdown
});

try {
	await program.parseAsync(process.argv);
} catch (error) {
	console.error('Error:', error instanceof Error ? error.message : error);
	process.exitCode = 1;
}
