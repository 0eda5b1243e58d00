/**
 * Failure taxonomy for repository, node and bootstrap operations.
 *
 * Follows the libp2p convention of one class per failure, identified by `name`,
 * so callers can branch with `instanceof` or on `err.name` across realms.
 */

/** No repository exists at the path; the caller must create one. */
export class NotInitializedError extends Error {
	static name = 'NotInitializedError';

	constructor(readonly path: string, message = `no repository found at ${path}`) {
		super(message);
		this.name = 'NotInitializedError';
	}
}

/** The on-disk format differs from the supported one; the caller must migrate. */
export class NeedsMigrationError extends Error {
	static name = 'NeedsMigrationError';

	constructor(readonly found: number, readonly expected: number) {
		super(`repository format is version ${found}, expected ${expected}`);
		this.name = 'NeedsMigrationError';
	}
}

export class MigrationError extends Error {
	static name = 'MigrationError';

	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'MigrationError';
	}
}

export class ConstructionError extends Error {
	static name = 'ConstructionError';

	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'ConstructionError';
	}
}

/** Config read/write or storage measurement failed. */
export class RepoIOError extends Error {
	static name = 'RepoIOError';

	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'RepoIOError';
	}
}

export class AddressParseError extends Error {
	static name = 'AddressParseError';

	constructor(readonly address: string, reason: string, options?: ErrorOptions) {
		super(`invalid peer address "${address}": ${reason}`, options);
		this.name = 'AddressParseError';
	}
}

export class DialError extends Error {
	static name = 'DialError';

	constructor(readonly peerId: string, options?: ErrorOptions) {
		super(`failed to connect to ${peerId}: ${describeCause(options?.cause)}`, options);
		this.name = 'DialError';
	}
}

export class InvalidTransitionError extends Error {
	static name = 'InvalidTransitionError';

	constructor(message: string) {
		super(message);
		this.name = 'InvalidTransitionError';
	}
}

export function describeCause(cause: unknown): string {
	if (cause instanceof Error) return cause.message;
	return String(cause);
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && 'code' in err;
}
