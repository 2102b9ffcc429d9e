/**
 * Resolves with the first argument of the next event in `names`, or rejects
 * if the emitter emits `error` first.
 */
export function once<T>(
	emitter: NodeJS.EventEmitter,
	names: string | string[]
): Promise<T> {
	const events = Array.isArray(names) ? names : [names];
	return new Promise((resolve, reject) => {
		function cleanup() {
			for (const name of events) {
				emitter.removeListener(name, onEvent);
			}
			emitter.removeListener('error', onError);
		}
		function onEvent(arg: T) {
			cleanup();
			resolve(arg);
		}
		function onError(err: Error) {
			cleanup();
			reject(err);
		}
		for (const name of events) {
			emitter.on(name, onEvent);
		}
		emitter.on('error', onError);
	});
}
