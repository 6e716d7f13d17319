/**
 * Domain-specific error classes for the Hostbeat system.
 *
 * These errors represent the failure categories of the heartbeat engine:
 * configuration, transport and response decoding.
 *
 * @module @hostbeat/common/errors/domain
 */

import { HostbeatError } from "./base";

/**
 * Error codes for domain errors.
 */
export const ErrorCodes = {
	// Configuration
	CONFIG_MISSING_SETTING: "CONFIG_MISSING_SETTING",
	CONFIG_INVALID: "CONFIG_INVALID",
	CONFIG_READ_FAILED: "CONFIG_READ_FAILED",

	// Transport
	TRANSPORT_REQUEST_FAILED: "TRANSPORT_REQUEST_FAILED",
	TRANSPORT_TIMEOUT: "TRANSPORT_TIMEOUT",
	TRANSPORT_BAD_STATUS: "TRANSPORT_BAD_STATUS",

	// Decoding
	DECODE_INVALID_JSON: "DECODE_INVALID_JSON",
	DECODE_SCHEMA_MISMATCH: "DECODE_SCHEMA_MISMATCH",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** Longest slice of a raw payload kept on an error. */
const MAX_PAYLOAD_CHARS = 500;

function truncate(value: string | undefined): string | undefined {
	return value === undefined ? undefined : value.slice(0, MAX_PAYLOAD_CHARS);
}

/**
 * Error for missing or invalid startup configuration.
 *
 * Fatal to agent creation: no engine instance comes up.
 *
 * @example
 * ```ts
 * throw new ConfigError("Heartbeat endpoint is required", "heartbeatEndpoint");
 * ```
 */
export class ConfigError extends HostbeatError {
	/**
	 * The setting that was missing or invalid (if applicable).
	 */
	public readonly setting?: string;

	constructor(
		message: string,
		setting?: string,
		cause?: Error,
		code: ErrorCode = ErrorCodes.CONFIG_MISSING_SETTING,
	) {
		super(message, code, cause);
		this.name = "ConfigError";
		this.setting = setting;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			setting: this.setting,
		};
	}
}

/**
 * Error for a failed heartbeat exchange.
 *
 * Covers connection failures, timeouts and non-success status codes. The
 * scheduler logs it and retries on the next tick.
 *
 * @example
 * ```ts
 * throw TransportError.badStatus(503, "Service Unavailable");
 * ```
 */
export class TransportError extends HostbeatError {
	/**
	 * HTTP status code, when a response was received.
	 */
	public readonly status?: number;

	/**
	 * Response body, truncated for logging.
	 */
	public readonly body?: string;

	constructor(
		message: string,
		code: ErrorCode = ErrorCodes.TRANSPORT_REQUEST_FAILED,
		cause?: Error,
		options?: { status?: number; body?: string },
	) {
		super(message, code, cause);
		this.name = "TransportError";
		this.status = options?.status;
		this.body = truncate(options?.body);
	}

	static badStatus(status: number, body: string): TransportError {
		return new TransportError(
			`Received non-success code from agent. Status code: ${status}`,
			ErrorCodes.TRANSPORT_BAD_STATUS,
			undefined,
			{ status, body },
		);
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			status: this.status,
			body: this.body,
		};
	}
}

/**
 * Error for a heartbeat response that could not be decoded.
 *
 * Thrown before any state is touched, so a failed decode never leaves a
 * partial merge behind.
 *
 * @example
 * ```ts
 * throw new DecodeError("Failed to parse heartbeat", rawBody, syntaxError);
 * ```
 */
export class DecodeError extends HostbeatError {
	/**
	 * The raw input that failed to decode, truncated for logging.
	 */
	public readonly input?: string;

	constructor(
		message: string,
		input?: string,
		cause?: Error,
		code: ErrorCode = ErrorCodes.DECODE_INVALID_JSON,
	) {
		super(message, code, cause);
		this.name = "DecodeError";
		this.input = truncate(input);
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			input: this.input,
		};
	}
}
