import createDebug from 'debug';
import fetch from 'node-fetch';
import { connect } from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';
import { once } from './once';
import { errorMessage } from './errors';
import { Readiness, ReadinessChecker } from './types';

const debug = createDebug('devstack:readiness');

const ATTEMPT_TIMEOUT = 2000;

export async function checkTcp(
	port: number,
	host: string = '127.0.0.1',
	timeoutMs: number = ATTEMPT_TIMEOUT
): Promise<boolean> {
	const socket = connect({ port, host });
	socket.setTimeout(timeoutMs, () => {
		socket.destroy(new Error(`Connection to ${host}:${port} timed out`));
	});
	try {
		await once<void>(socket, 'connect');
		return true;
	} catch (err) {
		debug('tcp %s:%o not ready: %s', host, port, errorMessage(err));
		return false;
	} finally {
		socket.destroy();
	}
}

export async function checkHttp(
	url: string,
	timeoutMs: number = ATTEMPT_TIMEOUT
): Promise<boolean> {
	try {
		const res = await fetch(url, { timeout: timeoutMs });
		debug('GET %s -> %o', url, res.status);
		return res.ok;
	} catch (err) {
		debug('GET %s failed: %s', url, errorMessage(err));
		return false;
	}
}

export function checkOnce(readiness: Readiness): Promise<boolean> {
	if (readiness.type === 'tcp') {
		return checkTcp(readiness.port, readiness.host);
	}
	return checkHttp(readiness.url);
}

/**
 * Polls `readiness` until it succeeds or `timeoutMs` has elapsed. Resolves
 * `false` on timeout, never rejects.
 */
export const waitForReady: ReadinessChecker = async (
	readiness,
	{ timeoutMs, intervalMs }
) => {
	const deadline = Date.now() + timeoutMs;
	for (;;) {
		if (await checkOnce(readiness)) {
			return true;
		}
		if (Date.now() + intervalMs > deadline) {
			return false;
		}
		await sleep(intervalMs);
	}
};
