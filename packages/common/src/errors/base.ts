/**
 * Base error class for the Hostbeat system.
 *
 * All domain-specific errors should extend this class.
 *
 * @module @hostbeat/common/errors/base
 */

/**
 * Base error class for all Hostbeat errors.
 *
 * Provides structured error handling with:
 * - Error codes for programmatic handling
 * - Cause chaining for root cause analysis
 * - Consistent serialization for logging
 *
 * @example
 * ```ts
 * throw new HostbeatError("Heartbeat failed", "HEARTBEAT_FAILED", originalError);
 * ```
 */
export class HostbeatError extends Error {
	/**
	 * Error code for programmatic error handling.
	 * Use SCREAMING_SNAKE_CASE (e.g., "TRANSPORT_TIMEOUT").
	 */
	public readonly code: string;

	/**
	 * Original error that caused this error.
	 */
	public override readonly cause?: Error;

	/**
	 * Timestamp when the error was created.
	 */
	public readonly timestamp: number;

	constructor(message: string, code: string, cause?: Error) {
		super(message);
		this.name = "HostbeatError";
		this.code = code;
		this.cause = cause;
		this.timestamp = Date.now();

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Convert error to a plain object for logging/serialization.
	 * Stack traces are excluded.
	 */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			timestamp: this.timestamp,
			cause: this.cause
				? {
						name: this.cause.name,
						message: this.cause.message,
					}
				: undefined,
		};
	}

	/**
	 * Create a formatted string representation for logging.
	 */
	toLogString(): string {
		const parts = [`[${this.code}] ${this.message}`];

		if (this.cause) {
			parts.push(`  Caused by: ${this.cause.message}`);
		}

		return parts.join("\n");
	}
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}
