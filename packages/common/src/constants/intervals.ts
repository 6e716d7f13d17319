/**
 * Interval constants for the Hostbeat system.
 *
 * All values are in milliseconds.
 *
 * @module @hostbeat/common/constants/intervals
 */

/**
 * Heartbeat cadence and exchange bounds.
 */
export const HeartbeatIntervals = {
	/** Time between heartbeats when nothing signals an early one (1 second) */
	HEARTBEAT_MS: 1000,

	/** Upper bound on a single heartbeat exchange (5 seconds) */
	REQUEST_TIMEOUT_MS: 5 * 1000, // 5_000

	/** Smallest interval accepted from configuration */
	MIN_HEARTBEAT_MS: 10,
} as const;
