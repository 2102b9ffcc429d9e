import { EventEmitter } from 'node:events';
import { SpawnOptions } from 'node:child_process';
import {
	DetachedSpawner,
	SpawnFn,
	buildInvocation,
	quoteWindowsArg
} from '../src/spawner';
import { SpawnError } from '../src/errors';
import { defaultServices } from '../src/config';
import { Runtime } from '../src/types';

const [api, , web] = defaultServices();
const runtime: Runtime = { command: 'python3', version: '3.11.4' };

class FakeChild extends EventEmitter {
	pid = 4242;
	unrefCount = 0;

	unref(): void {
		this.unrefCount++;
	}
}

interface Call {
	command: string;
	args: string[];
	options: SpawnOptions;
	child: FakeChild;
}

function fakeSpawn(outcome: 'spawn' | Error = 'spawn') {
	const calls: Call[] = [];
	const spawnFn: SpawnFn = (command, args, options) => {
		const child = new FakeChild();
		calls.push({ command, args, options, child });
		process.nextTick(() => {
			if (outcome === 'spawn') {
				child.emit('spawn');
			} else {
				child.emit('error', outcome);
			}
		});
		return child;
	};
	return { spawnFn, calls };
}

it('quote_windows_arg', () => {
	expect(quoteWindowsArg('api_server.py')).toBe('api_server.py');
	expect(quoteWindowsArg('index (27).html')).toBe('"index (27).html"');
	expect(quoteWindowsArg('C:\\Program Files\\Python')).toBe(
		'"C:\\Program Files\\Python"'
	);
	expect(quoteWindowsArg('')).toBe('""');
});

it('invocation_posix', () => {
	expect(buildInvocation(runtime, api, '/srv/app', 'linux')).toEqual({
		command: 'python3',
		args: ['api_server.py'],
		options: { cwd: '/srv/app', detached: true, stdio: 'inherit' }
	});
});

it('invocation_windows_opens_titled_console', () => {
	const python: Runtime = { command: 'python', version: '3.12.1' };
	const invocation = buildInvocation(python, web, 'C:\\dev\\my app', 'win32');
	expect(invocation.command).toBe('cmd.exe');
	expect(invocation.args).toEqual([
		'/c',
		'start',
		'"Web Server"',
		'/D',
		'"C:\\dev\\my app"',
		'python',
		'-m',
		'http.server',
		'8080'
	]);
	expect(invocation.options).toEqual({
		cwd: 'C:\\dev\\my app',
		detached: true,
		stdio: 'ignore',
		windowsVerbatimArguments: true
	});
});

it('spawn_detaches_and_unrefs', async () => {
	const { spawnFn, calls } = fakeSpawn();
	const spawner = new DetachedSpawner(spawnFn, 'linux');
	const spawned = await spawner.spawn(runtime, api, '/srv/app');
	expect(spawned).toEqual({ name: 'api', pid: 4242 });
	expect(calls).toHaveLength(1);
	expect(calls[0].options.detached).toBe(true);
	expect(calls[0].child.unrefCount).toBe(1);
	expect(calls[0].child.listenerCount('error')).toBe(0);
});

it('spawn_windows_has_no_service_pid', async () => {
	const { spawnFn } = fakeSpawn();
	const spawner = new DetachedSpawner(spawnFn, 'win32');
	const spawned = await spawner.spawn(runtime, web, 'C:\\dev');
	expect(spawned).toEqual({ name: 'web', pid: undefined });
});

it('spawn_error', async () => {
	const cause = Object.assign(new Error('spawn python3 ENOENT'), {
		code: 'ENOENT'
	});
	const { spawnFn, calls } = fakeSpawn(cause);
	const spawner = new DetachedSpawner(spawnFn, 'linux');
	let err: unknown;
	try {
		await spawner.spawn(runtime, api, '/srv/app');
	} catch (_err) {
		err = _err;
	}
	expect(err).toBeInstanceOf(SpawnError);
	if (err instanceof SpawnError) {
		expect(err.name).toBe('SpawnError');
		expect(err.service).toBe('api');
		expect(err.code).toBe('ENOENT');
		expect(err.message).toBe('Failed to start "api": spawn python3 ENOENT');
	}
	expect(calls[0].child.unrefCount).toBe(0);
});
