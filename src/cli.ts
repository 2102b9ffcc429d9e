import createDebug from 'debug';
import { launch } from './launcher';
import type { LaunchOptions } from './launcher';
import { RuntimeNotFoundError, errorMessage } from './errors';
import { LaunchReport } from './types';

const debug = createDebug('devstack:cli');

export type LaunchFn = (opts?: LaunchOptions) => Promise<LaunchReport>;

/**
 * Runs the launcher and maps the outcome to the process exit code: `1` when
 * Python is missing or anything unexpected happens, `0` otherwise.
 */
export async function main(
	run: LaunchFn = launch,
	log: (message: string) => void = console.error
): Promise<number> {
	try {
		const report = await run();
		debug('Launch report: %o', report);
		return 0;
	} catch (err) {
		if (err instanceof RuntimeNotFoundError) {
			log(`ERROR: ${err.message}`);
		} else {
			log(errorMessage(err));
			debug('Unexpected error: %o', err);
		}
		return 1;
	}
}
