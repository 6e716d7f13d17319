import { DecodeError, ErrorCodes, toError } from "@hostbeat/common";
import { type HeartbeatRequest, type HeartbeatResponse, Operation } from "../types";
import { parseMaintenanceTime } from "./maintenance";
import { type HeartbeatRequestWire, HeartbeatResponseWireSchema } from "./schemas";

const OPERATIONS = new Map<string, Operation>([
	["Continue", Operation.Continue],
	["Active", Operation.Active],
	["Terminate", Operation.Terminate],
]);

/**
 * Map an operation name to an {@link Operation}. Matching is exact and
 * case-sensitive; every other name is `Unknown`.
 */
export function parseOperation(name: string): Operation {
	return OPERATIONS.get(name) ?? Operation.Unknown;
}

/**
 * Serialize a heartbeat request to its JSON body.
 */
export function encodeHeartbeatRequest(request: HeartbeatRequest): string {
	const wire: HeartbeatRequestWire = {
		CurrentGameState: request.currentState,
		CurrentGameHealth: request.isHealthy ? "Healthy" : "Unhealthy",
		CurrentPlayers: request.players.map((player) => ({ PlayerId: player.playerId })),
	};
	return JSON.stringify(wire);
}

/**
 * Decode a heartbeat response body.
 *
 * Decoding is pure and all-or-nothing: a body that is not JSON, or whose
 * structured members have the wrong shape, throws {@link DecodeError} and
 * nothing is applied.
 *
 * @throws {DecodeError}
 */
export function decodeHeartbeatResponse(body: string): HeartbeatResponse {
	let payload: unknown;
	try {
		payload = JSON.parse(body);
	} catch (error) {
		throw new DecodeError("Failed to parse heartbeat response", body, toError(error));
	}

	const parseResult = HeartbeatResponseWireSchema.safeParse(payload);
	if (!parseResult.success) {
		throw new DecodeError(
			`Heartbeat response has an unexpected shape: ${parseResult.error.issues
				.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
				.join("; ")}`,
			body,
			parseResult.error,
			ErrorCodes.DECODE_SCHEMA_MISMATCH,
		);
	}

	const { sessionConfig, nextScheduledMaintenanceUtc, operation } = parseResult.data;
	const response: HeartbeatResponse = {};

	if (sessionConfig) {
		response.sessionConfig = stringEntries(sessionConfig);
		if (sessionConfig.metadata) {
			response.metadata = stringEntries(sessionConfig.metadata);
		}
		if (sessionConfig.initialPlayers) {
			response.initialPlayers = sessionConfig.initialPlayers.filter(
				(player): player is string => typeof player === "string",
			);
		}
	}

	if (nextScheduledMaintenanceUtc != null) {
		response.nextScheduledMaintenanceUtc = parseMaintenanceTime(nextScheduledMaintenanceUtc);
	}

	if (operation != null) {
		response.operation = parseOperation(operation);
		response.operationName = operation;
	}

	return response;
}

function stringEntries(values: Record<string, unknown>): Record<string, string> {
	const entries: Record<string, string> = {};
	for (const [key, value] of Object.entries(values)) {
		if (typeof value === "string") {
			entries[key] = value;
		}
	}
	return entries;
}
