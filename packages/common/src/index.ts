/**
 * @hostbeat/common - Shared errors, constants and utilities for the Hostbeat system.
 *
 * @example
 * ```ts
 * import { ConfigError, HeartbeatIntervals, envStr } from "@hostbeat/common";
 * ```
 *
 * @module @hostbeat/common
 */

// =============================================================================
// Utils
// =============================================================================

export { envBool, envNum, envStr } from "./utils";

// =============================================================================
// Errors
// =============================================================================

export type { ErrorCode } from "./errors";
export {
	ConfigError,
	DecodeError,
	ErrorCodes,
	HostbeatError,
	toError,
	TransportError,
} from "./errors";

// =============================================================================
// Constants
// =============================================================================

export { HeartbeatIntervals } from "./constants";
