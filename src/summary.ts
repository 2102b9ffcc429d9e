import { LauncherConfig } from './types';

type SummaryConfig = Pick<LauncherConfig, 'apiPort' | 'webPort' | 'webEntry'>;

export function apiUrl({ apiPort }: Pick<SummaryConfig, 'apiPort'>): string {
	return `http://localhost:${apiPort}`;
}

export function webUrl({ webPort }: Pick<SummaryConfig, 'webPort'>): string {
	return `http://localhost:${webPort}`;
}

export function formatSummary(config: SummaryConfig): string[] {
	return [
		'',
		'All services started!',
		'',
		`API Server:  ${apiUrl(config)}`,
		`Web Server:  ${webUrl(config)}/${config.webEntry}`,
		`Health:      ${apiUrl(config)}/health`,
		'',
		'Keep all windows open while developing.',
		''
	];
}
