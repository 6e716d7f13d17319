/**
 * Pino Redaction Configuration
 *
 * Paths to redact sensitive data from logs.
 * Uses Pino's built-in redaction rather than manual scrubbing.
 */

export const DEFAULT_REDACT_PATHS = [
	// Request headers
	"req.headers.authorization",
	"req.headers.cookie",
	"headers.authorization",

	// Secrets pushed through session config
	"*.password",
	"*.secret",
	"*.token",
	"*.apiKey",
	"*.api_key",
	"secrets.*",
] as const;

export type RedactPath = (typeof DEFAULT_REDACT_PATHS)[number];

/**
 * Merge custom redaction paths with defaults
 */
export function mergeRedactPaths(customPaths?: readonly string[]): readonly string[] {
	if (!customPaths?.length) {
		return DEFAULT_REDACT_PATHS;
	}
	const combined = new Set<string>([...DEFAULT_REDACT_PATHS, ...customPaths]);
	return Array.from(combined);
}
