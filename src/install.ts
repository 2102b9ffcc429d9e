import createDebug from 'debug';
import { execCommand } from './exec';
import { errorMessage } from './errors';
import { Exec, InstallResult, Installer, Runtime } from './types';

const debug = createDebug('devstack:install');

export function pipInstallArgs(packages: string[]): string[] {
	return ['-m', 'pip', 'install', ...packages];
}

/**
 * Installs packages with `<python> -m pip install`. The packages are not
 * pinned, and pip's output is never shown. Failures are reported in the
 * result, never thrown.
 */
export class PipInstaller implements Installer {
	private run: Exec;

	constructor(run: Exec = execCommand) {
		this.run = run;
	}

	async install(runtime: Runtime, packages: string[]): Promise<InstallResult> {
		if (packages.length === 0) {
			return { ok: true, exitCode: null, packages };
		}

		debug('Installing %o with %o', packages, runtime.command);
		try {
			const res = await this.run(runtime.command, pipInstallArgs(packages));
			const exitCode = typeof res.exitCode === 'number' ? res.exitCode : null;
			debug('pip exited with code %o', exitCode);
			return { ok: exitCode === 0, exitCode, packages };
		} catch (err) {
			debug('pip could not be started: %s', errorMessage(err));
			return { ok: false, exitCode: null, packages, error: errorMessage(err) };
		}
	}
}
