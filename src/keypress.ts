import { once } from './once';

export interface KeyInput extends NodeJS.EventEmitter {
	isTTY?: boolean;
	isRaw?: boolean;
	setRawMode?(mode: boolean): unknown;
	resume(): unknown;
	pause(): unknown;
}

/**
 * Resolves on the first chunk read from `input`, or when `input` ends or
 * closes without sending anything. A TTY is switched to raw mode for the
 * wait so that any key, not just Enter, continues.
 */
export async function waitForKeypress(
	input: KeyInput = process.stdin
): Promise<void> {
	const wasRaw = Boolean(input.isRaw);
	const raw = Boolean(input.isTTY) && typeof input.setRawMode === 'function';
	if (raw && input.setRawMode) {
		input.setRawMode(true);
	}
	input.resume();
	try {
		await once<Buffer | undefined>(input, ['data', 'end', 'close']);
	} finally {
		if (raw && input.setRawMode) {
			input.setRawMode(wasRaw);
		}
		input.pause();
	}
}
