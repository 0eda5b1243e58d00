/**
 * Creates a cancelable lifetime. When `parent` is given, aborting the parent
 * aborts the child, but aborting the child leaves the parent running.
 */
export function createLifetime(parent?: AbortSignal): AbortController {
	const controller = new AbortController();
	if (parent == null) return controller;
	if (parent.aborted) {
		controller.abort(parent.reason);
		return controller;
	}
	const onAbort = (): void => { controller.abort(parent.reason); };
	parent.addEventListener('abort', onAbort, { once: true });
	controller.signal.addEventListener('abort', () => { parent.removeEventListener('abort', onAbort); }, { once: true });
	return controller;
}
