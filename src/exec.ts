import { exec } from 'tinyexec';
import { Exec } from './types';

/**
 * Runs `command` to completion and collects its output. A command that could
 * not be started at all (e.g. `ENOENT`) rejects.
 */
export const execCommand: Exec = async (command, args) => {
	const res = await exec(command, args, { throwOnError: false });
	return {
		stdout: res.stdout,
		stderr: res.stderr,
		exitCode: res.exitCode
	};
};
