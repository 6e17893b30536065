export type ErrnoException = NodeJS.ErrnoException;

export const isErrnoException = (error: unknown): error is ErrnoException =>
	typeof error === "object" &&
	error !== null &&
	"code" in error &&
	(typeof error.code === "string" ||
		typeof error.code === "number" ||
		error.code === undefined);

export const getErrnoCode = (error: unknown): string | undefined =>
	isErrnoException(error) && typeof error.code === "string"
		? error.code
		: undefined;

export const getErrorMessage = (error: unknown) =>
	error instanceof Error ? error.message : String(error);

/**
 * A clipboard (local or remote) could not be read this time around.
 * Expected while polling an offline peer or an empty clipboard.
 */
export class TransientReadError extends Error {
	override readonly name = "TransientReadError";

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
	}
}

/**
 * A clipboard (local or remote) could not be written this time around.
 */
export class TransientWriteError extends Error {
	override readonly name = "TransientWriteError";

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
	}
}

/**
 * Missing or invalid configuration. Fatal before a session starts.
 */
export class ConfigurationError extends Error {
	override readonly name = "ConfigurationError";

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
	}
}
