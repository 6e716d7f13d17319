/**
 * Environment variable utilities.
 *
 * Type-safe helpers for reading environment variables with defaults.
 *
 * @module @hostbeat/common/utils/env
 */

/**
 * Parse a boolean from an environment variable.
 *
 * Recognizes "true" and "1" as true (case-insensitive).
 * Returns defaultValue if the environment variable is not set.
 *
 * @example
 * ```ts
 * const shouldLog = envBool("HEARTBEAT_SHOULD_LOG", true);
 * ```
 */
export function envBool(key: string, defaultValue: boolean): boolean {
	const val = process.env[key];
	if (val === undefined) return defaultValue;
	return val.toLowerCase() === "true" || val === "1";
}

/**
 * Parse an integer from an environment variable.
 *
 * Returns defaultValue if the environment variable is not set or not a valid number.
 *
 * @example
 * ```ts
 * const intervalMs = envNum("HEARTBEAT_INTERVAL_MS", 1000);
 * ```
 */
export function envNum(key: string, defaultValue: number): number {
	const val = process.env[key];
	if (val === undefined) return defaultValue;
	const parsed = Number.parseInt(val, 10);
	return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Get a string from an environment variable.
 *
 * Returns defaultValue if the environment variable is not set.
 *
 * @example
 * ```ts
 * const endpoint = envStr("HEARTBEAT_ENDPOINT", "");
 * ```
 */
export function envStr(key: string, defaultValue: string): string {
	return process.env[key] ?? defaultValue;
}
