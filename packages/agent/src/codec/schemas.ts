/**
 * Zod schemas for the heartbeat wire format.
 *
 * Requests use PascalCase keys and responses camelCase keys, matching what the
 * orchestrator's local agent sends and accepts.
 *
 * @module @hostbeat/agent/codec/schemas
 */

import { z } from "zod";

// ============================================================================
// Request
// ============================================================================

export const WirePlayerSchema = z.object({
	PlayerId: z.string(),
});

/**
 * Heartbeat request body sent to the agent.
 */
export const HeartbeatRequestWireSchema = z.object({
	CurrentGameState: z.string(),
	CurrentGameHealth: z.enum(["Healthy", "Unhealthy"]),
	CurrentPlayers: z.array(WirePlayerSchema),
});
export type HeartbeatRequestWire = z.infer<typeof HeartbeatRequestWireSchema>;

// ============================================================================
// Response
// ============================================================================

/**
 * `sessionConfig` carries arbitrary string settings alongside two structured
 * members. Non-string entries are dropped during decoding, not rejected.
 */
export const SessionConfigWireSchema = z
	.object({
		initialPlayers: z.array(z.unknown()).nullish(),
		metadata: z.record(z.unknown()).nullish(),
	})
	.passthrough();

/**
 * Heartbeat response body. Unknown top-level fields are ignored and `null`
 * counts as absent.
 */
export const HeartbeatResponseWireSchema = z.object({
	sessionConfig: SessionConfigWireSchema.nullish(),
	nextScheduledMaintenanceUtc: z.string().nullish(),
	operation: z.string().nullish(),
});
export type HeartbeatResponseWire = z.infer<typeof HeartbeatResponseWireSchema>;
