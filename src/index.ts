import { launch } from './launcher';
import {
	DEFAULT_PACKAGES,
	defaultRuntimeCandidates,
	defaultServices,
	resolveConfig
} from './config';
import { RuntimeNotFoundError, SpawnError } from './errors';
import { PipInstaller } from './install';
import { DetachedSpawner } from './spawner';
import { probeRuntime } from './runtime';
import { waitForReady } from './readiness';
import { formatSummary } from './summary';

export * from './types';
export type { LaunchOptions, Output } from './launcher';
export {
	launch,
	DEFAULT_PACKAGES,
	defaultRuntimeCandidates,
	defaultServices,
	resolveConfig,
	RuntimeNotFoundError,
	SpawnError,
	PipInstaller,
	DetachedSpawner,
	probeRuntime,
	waitForReady,
	formatSummary
};
