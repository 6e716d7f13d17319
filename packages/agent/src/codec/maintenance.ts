/**
 * Timestamp returned in place of a maintenance time that cannot be parsed:
 * 2000-01-01T00:00:00Z.
 */
export const FAR_PAST_MAINTENANCE_MS = Date.UTC(2000, 0, 1, 0, 0, 0);

const MAINTENANCE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?Z$/;

/**
 * Parse `yyyy-mm-ddThh:mm:ssZ`, with optional fractional seconds, as UTC.
 * Fractions are truncated. Anything else, including out-of-range fields such
 * as February 30th, yields the far-past sentinel.
 */
export function parseMaintenanceTime(value: string): Date {
	const match = MAINTENANCE_PATTERN.exec(value);
	if (!match) {
		return new Date(FAR_PAST_MAINTENANCE_MS);
	}

	const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
	const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));

	// Date.UTC rolls out-of-range fields over instead of failing
	const exact =
		date.getUTCFullYear() === year &&
		date.getUTCMonth() === month - 1 &&
		date.getUTCDate() === day &&
		date.getUTCHours() === hour &&
		date.getUTCMinutes() === minute &&
		date.getUTCSeconds() === second;

	return exact ? date : new Date(FAR_PAST_MAINTENANCE_MS);
}

export function isFarPastMaintenance(date: Date): boolean {
	return date.getTime() === FAR_PAST_MAINTENANCE_MS;
}
