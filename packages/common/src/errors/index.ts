/**
 * Error types for the Hostbeat system.
 *
 * @module @hostbeat/common/errors
 */

export { HostbeatError, toError } from "./base";
export type { ErrorCode } from "./domain";
export { ConfigError, DecodeError, ErrorCodes, TransportError } from "./domain";
