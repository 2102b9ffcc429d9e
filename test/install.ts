import { PipInstaller, pipInstallArgs } from '../src/install';
import { Exec, Runtime } from '../src/types';

const runtime: Runtime = { command: 'python3', version: '3.11.4' };

function recordingExec(result: () => Promise<number | undefined>) {
	const calls: string[][] = [];
	const exec: Exec = async (command, args) => {
		calls.push([command, ...args]);
		return { stdout: 'lots of pip output', stderr: '', exitCode: await result() };
	};
	return { exec, calls };
}

it('pip_install_args', () => {
	expect(pipInstallArgs(['flask', 'flask-cors'])).toEqual([
		'-m',
		'pip',
		'install',
		'flask',
		'flask-cors'
	]);
});

it('install_success', async () => {
	const { exec, calls } = recordingExec(async () => 0);
	const result = await new PipInstaller(exec).install(runtime, ['flask']);
	expect(result).toEqual({ ok: true, exitCode: 0, packages: ['flask'] });
	expect(calls).toEqual([['python3', '-m', 'pip', 'install', 'flask']]);
});

it('install_failure_is_reported', async () => {
	const { exec } = recordingExec(async () => 1);
	const result = await new PipInstaller(exec).install(runtime, ['flask']);
	expect(result).toEqual({ ok: false, exitCode: 1, packages: ['flask'] });
});

it('install_unknown_exit_code', async () => {
	const { exec } = recordingExec(async () => undefined);
	const result = await new PipInstaller(exec).install(runtime, ['flask']);
	expect(result).toEqual({ ok: false, exitCode: null, packages: ['flask'] });
});

it('install_start_failure_does_not_throw', async () => {
	const { exec } = recordingExec(async () => {
		throw new Error('spawn python3 EACCES');
	});
	const result = await new PipInstaller(exec).install(runtime, ['flask']);
	expect(result).toEqual({
		ok: false,
		exitCode: null,
		packages: ['flask'],
		error: 'spawn python3 EACCES'
	});
});

it('install_nothing', async () => {
	const { exec, calls } = recordingExec(async () => 0);
	const result = await new PipInstaller(exec).install(runtime, []);
	expect(result).toEqual({ ok: true, exitCode: null, packages: [] });
	expect(calls).toEqual([]);
});
