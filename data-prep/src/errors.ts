/**
 * Error kinds raised by the harvest pipeline
 */

export class HarvestError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** The season argument is missing or not a positive integer */
export class ArgumentError extends HarvestError {}

/** A configuration override failed validation */
export class ConfigError extends HarvestError {}

/**
 * The request could not be sent, timed out, or got a non-2xx status.
 * `status` is null when no response arrived.
 */
export class TransportError extends HarvestError {
	constructor(
		public readonly url: string,
		public readonly status: number | null,
		message: string,
		options?: ErrorOptions
	) {
		super(`${message} (${url})`, options);
	}
}

/** The response body was not the expected JSON shape */
export class DecodeError extends HarvestError {
	constructor(
		public readonly url: string,
		message: string,
		options?: ErrorOptions
	) {
		super(`${message} (${url})`, options);
	}
}

/** Creating a directory or writing a record file failed */
export class FilesystemError extends HarvestError {
	constructor(
		public readonly path: string,
		message: string,
		options?: ErrorOptions
	) {
		super(`${message}: ${path}`, options);
	}
}

/** Work abandoned because a sibling task failed or the run was aborted */
export class CancelledError extends HarvestError {
	constructor(message = 'cancelled') {
		super(message);
	}
}

export function describeError(error: unknown): string {
	if (error instanceof HarvestError) {
		const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
		return `${error.name}: ${error.message}${cause}`;
	}
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}
