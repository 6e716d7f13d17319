/**
 * Sample Host Configuration
 *
 * Settings for the host process itself. The agent reads its own configuration
 * through its configuration sources.
 */

import { envBool, envNum, HeartbeatIntervals } from "@hostbeat/common";
import { z } from "zod";

export const SampleHostConfigSchema = z.object({
	/** Service name for logging */
	serviceName: z.string().default("sample-host"),

	/** Log level (debug, info, warn, error) */
	logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),

	/** Milliseconds between heartbeats */
	intervalMs: z.number().int().min(HeartbeatIntervals.MIN_HEARTBEAT_MS).default(HeartbeatIntervals.HEARTBEAT_MS),

	/** Agent debug logging */
	debugLogs: z.boolean().default(false),
});

export type SampleHostConfig = z.infer<typeof SampleHostConfigSchema>;

/**
 * Load configuration from environment variables with validation
 */
export function loadConfig(): SampleHostConfig {
	return SampleHostConfigSchema.parse({
		serviceName: process.env.SERVICE_NAME,
		logLevel: process.env.LOG_LEVEL,
		intervalMs: envNum("HEARTBEAT_INTERVAL_MS", HeartbeatIntervals.HEARTBEAT_MS),
		debugLogs: envBool("HEARTBEAT_DEBUG_LOGS", false),
	});
}
