/**
 * Subclassing `Error` in TypeScript:
 * https://stackoverflow.com/a/41102306/376773
 */

export const PYTHON_DOWNLOAD_URL = 'https://www.python.org/downloads/';

export class RuntimeNotFoundError extends Error {
	candidates: string[];

	constructor(candidates: string[]) {
		super(
			`Python was not found (tried: ${candidates.join(
				', '
			)}). Please install Python 3 from ${PYTHON_DOWNLOAD_URL} and make sure it is on your PATH.`
		);
		this.name = new.target.name;
		Object.setPrototypeOf(this, new.target.prototype);
		this.candidates = candidates;
	}
}

export class SpawnError extends Error {
	service: string;
	code?: string;

	constructor(service: string, cause: Error & { code?: string }) {
		super(`Failed to start "${service}": ${cause.message}`);
		this.name = new.target.name;
		Object.setPrototypeOf(this, new.target.prototype);
		this.service = service;
		this.code = cause.code;
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
