/**
 * Error types raised while building a changelog.
 *
 * Every failure is terminal: the CLI catches whatever reaches the top,
 * prints it and exits with status 1.
 */

export type SumitErrorCode =
	| "REPOSITORY_NOT_FOUND"
	| "INVALID_REMOTE_URL"
	| "UNSUPPORTED_REMOTE_URL"
	| "HEAD_RESOLUTION"
	| "LOG_TRAVERSAL";

export class SumitError extends Error {
	readonly code: SumitErrorCode;

	constructor(code: SumitErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

/**
 * Prefix a message with the cause's message, so wrapped errors read
 * "failed to get head ref: <what git said>".
 */
function withCause(context: string, cause: unknown): string {
	if (cause === undefined) return context;
	return `${context}: ${errorMessage(cause)}`;
}

export class RepositoryNotFoundError extends SumitError {
	constructor(dir: string, cause?: unknown) {
		super(
			"REPOSITORY_NOT_FOUND",
			withCause(`failed to open git repository at ${dir}`, cause),
			{ cause },
		);
	}
}

export class InvalidRemoteUrlError extends SumitError {
	readonly url: string;

	constructor(url: string) {
		super("INVALID_REMOTE_URL", `invalid remote url structure: ${url}`);
		this.url = url;
	}
}

export class UnsupportedRemoteUrlError extends SumitError {
	readonly url: string;

	constructor(url: string) {
		super("UNSUPPORTED_REMOTE_URL", `unsupported remote url structure: ${url}`);
		this.url = url;
	}
}

export class HeadResolutionError extends SumitError {
	constructor(cause?: unknown) {
		super("HEAD_RESOLUTION", withCause("failed to get head ref", cause), { cause });
	}
}

export class LogTraversalError extends SumitError {
	constructor(cause?: unknown) {
		super("LOG_TRAVERSAL", withCause("failed to get commit log", cause), { cause });
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Format any thrown value as the single line the CLI prints before exiting
 */
export function formatError(error: unknown): string {
	return `error: ${errorMessage(error)}`;
}
