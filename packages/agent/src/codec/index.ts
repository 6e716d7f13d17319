export {
	decodeHeartbeatResponse,
	encodeHeartbeatRequest,
	parseOperation,
} from "./codec";
export {
	FAR_PAST_MAINTENANCE_MS,
	isFarPastMaintenance,
	parseMaintenanceTime,
} from "./maintenance";
export type { HeartbeatRequestWire, HeartbeatResponseWire } from "./schemas";
export {
	HeartbeatRequestWireSchema,
	HeartbeatResponseWireSchema,
	SessionConfigWireSchema,
} from "./schemas";
