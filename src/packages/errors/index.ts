/**
 * Error codes for everything the relay can fail on.
 */
export enum ErrorCode {
	CONFIGURATION = "CONFIGURATION",
	SPAWN = "SPAWN",
	PROCESS_TIMEOUT = "PROCESS_TIMEOUT",
	PROCESS_EXIT = "PROCESS_EXIT",
	TELEGRAM_API = "TELEGRAM_API",
	UNKNOWN = "UNKNOWN",
}

/**
 * Base class for relay errors
 */
export class RelayError extends Error {
	constructor(
		message: string,
		public readonly code: ErrorCode = ErrorCode.UNKNOWN,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "RelayError";
	}
}

/**
 * Missing or invalid settings. Fatal at startup.
 */
export class ConfigurationError extends RelayError {
	constructor(
		message: string,
		public readonly issues: string[] = [],
	) {
		super(message, ErrorCode.CONFIGURATION);
		this.name = "ConfigurationError";
	}
}

/**
 * The assistant CLI could not be started.
 */
export class SpawnError extends RelayError {
	constructor(
		public readonly command: string,
		cause?: unknown,
	) {
		super(`Failed to start ${command}: ${describeError(cause)}`, ErrorCode.SPAWN, { cause });
		this.name = "SpawnError";
	}
}

/**
 * The assistant CLI ran past the configured timeout and was killed.
 */
export class ProcessTimeoutError extends RelayError {
	constructor(public readonly timeoutSeconds: number) {
		super(`Timed out after ${Math.floor(timeoutSeconds / 60)}min. Try breaking it into smaller asks.`, ErrorCode.PROCESS_TIMEOUT);
		this.name = "ProcessTimeoutError";
	}
}

/**
 * The assistant CLI exited non-zero without producing a result.
 */
export class ProcessExitError extends RelayError {
	constructor(
		public readonly exitCode: number | null,
		public readonly stderr: string,
	) {
		super(`Error (exit ${exitCode ?? "signal"}): ${stderr}`, ErrorCode.PROCESS_EXIT);
		this.name = "ProcessExitError";
	}
}

/**
 * A Telegram Bot API call failed or returned ok=false.
 */
export class TelegramApiError extends RelayError {
	constructor(
		public readonly method: string,
		public readonly description: string,
		public readonly status?: number,
	) {
		super(`Telegram API (${method}) error: ${description}`, ErrorCode.TELEGRAM_API);
		this.name = "TelegramApiError";
	}
}

export function describeError(error: unknown): string {
	if (error instanceof Error) return error.message;
	if (typeof error === "string") return error;
	return "Unknown error";
}

/**
 * Text shown in chat when a request fails in a way the relay did not anticipate.
 */
export function userFacingMessage(error: unknown): string {
	if (error instanceof ProcessTimeoutError || error instanceof ProcessExitError) {
		return error.message;
	}
	const name = error instanceof Error ? error.name : "UnknownError";
	return `Error: ${name}: check logs for details.`;
}
