import createDebug from 'debug';
import { EventEmitter } from 'node:events';
import { SpawnOptions, spawn } from 'node:child_process';
import { once } from './once';
import { SpawnError } from './errors';
import {
	ProcessSpawner,
	Runtime,
	ServiceDescriptor,
	SpawnedService
} from './types';

const debug = createDebug('devstack:spawn');

export interface ChildHandle extends EventEmitter {
	pid?: number;
	unref(): void;
}

export type SpawnFn = (
	command: string,
	args: string[],
	options: SpawnOptions
) => ChildHandle;

export interface SpawnInvocation {
	command: string;
	args: string[];
	options: SpawnOptions;
}

/**
 * Quotes an argument for `cmd.exe`. Used together with
 * `windowsVerbatimArguments` so that `start` sees the title as its first
 * quoted argument.
 */
export function quoteWindowsArg(arg: string): string {
	if (arg.length > 0 && !/[\s"()&^|<>]/.test(arg)) {
		return arg;
	}
	return `"${arg.replace(/"/g, '""')}"`;
}

/**
 * Builds the command that opens `service` in its own console. On Windows
 * that's `cmd /c start "<title>"`, which opens a new window and returns
 * immediately. Elsewhere the interpreter is started in a new process group
 * and shares the launcher's terminal.
 */
export function buildInvocation(
	runtime: Runtime,
	service: ServiceDescriptor,
	cwd: string,
	platform: NodeJS.Platform = process.platform
): SpawnInvocation {
	if (platform === 'win32') {
		return {
			command: 'cmd.exe',
			args: [
				'/c',
				'start',
				`"${service.title.replace(/"/g, '')}"`,
				'/D',
				quoteWindowsArg(cwd),
				quoteWindowsArg(runtime.command),
				...service.args.map(quoteWindowsArg)
			],
			options: {
				cwd,
				detached: true,
				stdio: 'ignore',
				windowsVerbatimArguments: true
			}
		};
	}
	return {
		command: runtime.command,
		args: service.args,
		options: {
			cwd,
			detached: true,
			stdio: 'inherit'
		}
	};
}

export class DetachedSpawner implements ProcessSpawner {
	private spawnFn: SpawnFn;
	private platform: NodeJS.Platform;

	constructor(
		spawnFn: SpawnFn = spawn,
		platform: NodeJS.Platform = process.platform
	) {
		this.spawnFn = spawnFn;
		this.platform = platform;
	}

	async spawn(
		runtime: Runtime,
		service: ServiceDescriptor,
		cwd: string
	): Promise<SpawnedService> {
		const { command, args, options } = buildInvocation(
			runtime,
			service,
			cwd,
			this.platform
		);
		debug('Starting %o: %o %o', service.name, command, args);

		const child = this.spawnFn(command, args, options);
		try {
			await once<void>(child, 'spawn');
		} catch (err) {
			throw new SpawnError(
				service.name,
				err instanceof Error ? err : new Error(String(err))
			);
		}

		// Let the launcher exit while the service keeps running
		child.unref();

		// On Windows the pid belongs to the short-lived `cmd /c start`
		const pid = this.platform === 'win32' ? undefined : child.pid;
		debug('Started %o (pid=%o)', service.name, pid);
		return { name: service.name, pid };
	}
}
