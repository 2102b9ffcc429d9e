import createDebug from 'debug';
import { pathExists } from 'fs-extra';
import { join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { resolveConfig } from './config';
import { errorMessage } from './errors';
import { PipInstaller } from './install';
import { waitForKeypress } from './keypress';
import { waitForReady } from './readiness';
import { probeRuntime } from './runtime';
import { DetachedSpawner } from './spawner';
import { formatSummary } from './summary';
import {
	Exec,
	InstallResult,
	Installer,
	LaunchReport,
	LauncherConfig,
	ProcessSpawner,
	ReadinessChecker,
	Runtime,
	ServiceDescriptor,
	ServiceReport
} from './types';

const debug = createDebug('devstack:launcher');

export interface Output {
	write(chunk: string): unknown;
}

export interface LaunchOptions extends Partial<LauncherConfig> {
	exec?: Exec;
	installer?: Installer;
	spawner?: ProcessSpawner;
	readiness?: ReadinessChecker;
	sleep?: (ms: number) => Promise<void>;
	keypress?: () => Promise<void>;
	pathExists?: (path: string) => Promise<boolean>;
	output?: Output;
}

function scriptOf(service: ServiceDescriptor): string | null {
	const [first] = service.args;
	return first && first.endsWith('.py') ? first : null;
}

async function install(
	installer: Installer,
	runtime: Runtime,
	packages: string[]
): Promise<InstallResult> {
	try {
		return await installer.install(runtime, packages);
	} catch (err) {
		return { ok: false, exitCode: null, packages, error: errorMessage(err) };
	}
}

/**
 * Brings up the local development environment: finds Python, installs the
 * dependencies, then opens each service in its own console, in order, waiting
 * between launches so that earlier services can bind their ports.
 *
 * Only a missing Python interpreter is fatal (`RuntimeNotFoundError`). Every
 * later failure is recorded in the returned report and the launch carries on.
 */
export async function launch(opts: LaunchOptions = {}): Promise<LaunchReport> {
	const config = resolveConfig(opts);
	const out: Output = opts.output || process.stdout;
	const installer = opts.installer || new PipInstaller(opts.exec);
	const spawner = opts.spawner || new DetachedSpawner();
	const isReady = opts.readiness || waitForReady;
	const wait = opts.sleep || ((ms: number) => sleep(ms));
	const exists = opts.pathExists || ((path: string) => pathExists(path));
	const print = (line: string) => out.write(`${line}\n`);

	print('Checking for Python...');
	const runtime = await probeRuntime(
		config.runtimeCandidates,
		config.runtimeRange,
		opts.exec
	);
	print(`Found Python ${runtime.version}`);

	print('Installing dependencies...');
	const installResult = await install(installer, runtime, config.packages);
	if (!installResult.ok) {
		debug('Dependency install failed: %o', installResult);
	}

	const services: ServiceReport[] = [];
	const last = config.services.length - 1;
	for (const [i, service] of config.services.entries()) {
		const script = scriptOf(service);
		const missing = script ? !(await exists(join(config.cwd, script))) : false;
		if (missing) {
			debug(
				'Script %o for %o does not exist in %o',
				script,
				service.name,
				config.cwd
			);
		}

		print(`Starting ${service.title}...`);
		const report: ServiceReport = {
			name: service.name,
			missing,
			readiness: 'skipped'
		};
		services.push(report);
		try {
			const spawned = await spawner.spawn(runtime, service, config.cwd);
			report.pid = spawned.pid;
		} catch (err) {
			debug('Could not start %o: %s', service.name, errorMessage(err));
			report.error = errorMessage(err);
		}

		// The fixed delay always applies between launches. A readiness probe
		// may extend the wait, it never shortens it.
		if (i < last) {
			debug('Waiting %o ms after %o', service.delayMs, service.name);
			await wait(service.delayMs);
		}
		if (service.readiness && !report.error) {
			const ready = await isReady(service.readiness, {
				timeoutMs: config.readinessTimeoutMs,
				intervalMs: config.readinessIntervalMs
			});
			report.readiness = ready ? 'ready' : 'timeout';
			debug('%o readiness: %o', service.name, report.readiness);
		}
	}

	for (const line of formatSummary(config)) {
		print(line);
	}

	if (config.waitForKey) {
		print('Press any key to exit...');
		await (opts.keypress || waitForKeypress)();
	}

	return { runtime, install: installResult, services };
}
