import createDebug from 'debug';
import { coerce, satisfies } from 'semver';
import { execCommand } from './exec';
import { RuntimeNotFoundError, errorMessage } from './errors';
import { Exec, Runtime } from './types';

const debug = createDebug('devstack:runtime');

/**
 * Extracts the version from `python --version` output. Python 2 prints it to
 * stderr, Python 3 to stdout, so both are considered.
 */
export function parsePythonVersion(output: string): string | null {
	const match = /Python\s+(\d+(?:\.\d+){0,2}\S*)/.exec(output);
	if (!match) {
		return null;
	}
	const version = coerce(match[1]);
	return version ? version.version : null;
}

export async function probeRuntime(
	candidates: string[],
	range: string = '>=3',
	run: Exec = execCommand
): Promise<Runtime> {
	for (const command of candidates) {
		debug('Probing %o', command);
		let output: string;
		try {
			const res = await run(command, ['--version']);
			if (res.exitCode !== 0) {
				debug('%o exited with code %o', command, res.exitCode);
				continue;
			}
			output = `${res.stdout}\n${res.stderr}`;
		} catch (err) {
			debug('Could not run %o: %s', command, errorMessage(err));
			continue;
		}

		const version = parsePythonVersion(output);
		if (!version) {
			debug('Unrecognized version output from %o: %o', command, output);
			continue;
		}
		if (!satisfies(version, range)) {
			debug('%o is Python %s, wanted %s', command, version, range);
			continue;
		}

		debug('Using %o (Python %s)', command, version);
		return { command, version };
	}
	throw new RuntimeNotFoundError(candidates);
}
