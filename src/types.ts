export type Readiness =
	| { type: 'tcp'; host?: string; port: number }
	| { type: 'http'; url: string };

export interface ServiceDescriptor {
	name: string;
	title: string; // Window title of the console the service is opened in
	args: string[]; // Arguments passed to the Python interpreter
	delayMs: number; // How long to wait before the next step
	readiness?: Readiness;
}

export interface Runtime {
	command: string;
	version: string;
}

export interface InstallResult {
	ok: boolean;
	exitCode: number | null;
	packages: string[];
	error?: string;
}

export interface SpawnedService {
	name: string;
	pid?: number;
}

export type ReadinessOutcome = 'ready' | 'timeout' | 'skipped';

export interface ServiceReport {
	name: string;
	pid?: number;
	missing: boolean;
	error?: string;
	readiness: ReadinessOutcome;
}

export interface LaunchReport {
	runtime: Runtime;
	install: InstallResult;
	services: ServiceReport[];
}

export interface LauncherConfig {
	runtimeCandidates: string[];
	runtimeRange: string;
	packages: string[];
	services: ServiceDescriptor[];
	apiPort: number;
	webPort: number;
	webEntry: string;
	readinessTimeoutMs: number;
	readinessIntervalMs: number;
	cwd: string;
	waitForKey: boolean;
}

export interface Installer {
	install(runtime: Runtime, packages: string[]): Promise<InstallResult>;
}

export interface ProcessSpawner {
	spawn(
		runtime: Runtime,
		service: ServiceDescriptor,
		cwd: string
	): Promise<SpawnedService>;
}

export interface ReadinessOptions {
	timeoutMs: number;
	intervalMs: number;
}

export type ReadinessChecker = (
	readiness: Readiness,
	opts: ReadinessOptions
) => Promise<boolean>;

export interface ExecResult {
	stdout: string;
	stderr: string;
	exitCode: number | undefined;
}

export type Exec = (command: string, args: string[]) => Promise<ExecResult>;
