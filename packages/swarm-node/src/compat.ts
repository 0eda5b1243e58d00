export interface PromiseResolvers<T> {
	promise: Promise<T>;
	resolve: (value: T | PromiseLike<T>) => void;
	reject: (reason?: unknown) => void;
}

declare global {
	interface PromiseConstructor {
		withResolvers?<T>(): PromiseResolvers<T>;
	}
}

export function withResolvers<T>(): PromiseResolvers<T> {
	let resolve: PromiseResolvers<T>['resolve'] = () => undefined;
	let reject: PromiseResolvers<T>['reject'] = () => undefined;
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

// libp2p 2.x calls Promise.withResolvers, which Node.js 20 does not have
if (typeof Promise.withResolvers !== 'function') {
	Object.defineProperty(Promise, 'withResolvers', { value: withResolvers, writable: true, configurable: true });
}
