import ms from 'ms';
import { LauncherConfig, ServiceDescriptor } from './types';

export const DEFAULT_PACKAGES: readonly string[] = Object.freeze([
	'flask',
	'flask-cors',
	'python-telegram-bot'
]);

export const DEFAULT_API_PORT = 5000;
export const DEFAULT_WEB_PORT = 8080;

// The entry document name is kept as shipped; override `webEntry` once the
// page has a stable name.
export const DEFAULT_WEB_ENTRY = 'index (27).html';

export const SPAWN_DELAY = ms('2s');

export function defaultRuntimeCandidates(
	platform: NodeJS.Platform = process.platform
): string[] {
	// Windows installs only ship `python.exe` (plus the `py` launcher)
	return platform === 'win32' ? ['python'] : ['python3', 'python'];
}

export function defaultServices(
	apiPort: number = DEFAULT_API_PORT,
	webPort: number = DEFAULT_WEB_PORT
): ServiceDescriptor[] {
	return [
		{
			name: 'api',
			title: 'API Server',
			args: ['api_server.py'],
			delayMs: SPAWN_DELAY,
			readiness: {
				type: 'http',
				url: `http://localhost:${apiPort}/health`
			}
		},
		{
			name: 'bot',
			title: 'Telegram Bot',
			args: ['admin_balance_bot.py'],
			delayMs: SPAWN_DELAY
		},
		{
			name: 'web',
			title: 'Web Server',
			args: ['-m', 'http.server', String(webPort)],
			delayMs: SPAWN_DELAY,
			readiness: { type: 'tcp', port: webPort }
		}
	];
}

export function resolveConfig(
	overrides: Partial<LauncherConfig> = {}
): LauncherConfig {
	const apiPort =
		typeof overrides.apiPort === 'number'
			? overrides.apiPort
			: DEFAULT_API_PORT;
	const webPort =
		typeof overrides.webPort === 'number'
			? overrides.webPort
			: DEFAULT_WEB_PORT;
	return {
		runtimeCandidates:
			overrides.runtimeCandidates || defaultRuntimeCandidates(),
		runtimeRange: overrides.runtimeRange || '>=3',
		packages: [...(overrides.packages || DEFAULT_PACKAGES)],
		services: overrides.services || defaultServices(apiPort, webPort),
		apiPort,
		webPort,
		webEntry:
			typeof overrides.webEntry === 'string'
				? overrides.webEntry
				: DEFAULT_WEB_ENTRY,
		readinessTimeoutMs:
			typeof overrides.readinessTimeoutMs === 'number'
				? overrides.readinessTimeoutMs
				: ms('10s'),
		readinessIntervalMs:
			typeof overrides.readinessIntervalMs === 'number'
				? overrides.readinessIntervalMs
				: 250,
		cwd: overrides.cwd || process.cwd(),
		waitForKey:
			typeof overrides.waitForKey === 'boolean'
				? overrides.waitForKey
				: Boolean(process.stdin.isTTY)
	};
}
