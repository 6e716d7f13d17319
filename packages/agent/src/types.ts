/**
 * Domain types shared by the heartbeat engine.
 *
 * @module @hostbeat/agent/types
 */

/**
 * Lifecycle of a hosted game server. The wire name equals the member name.
 */
export enum GameState {
	Invalid = "Invalid",
	Initializing = "Initializing",
	StandingBy = "StandingBy",
	Active = "Active",
	Terminating = "Terminating",
}

/**
 * Instruction returned by the orchestrator in a heartbeat response.
 * Names the orchestrator sends that are not recognized decode to `Unknown`.
 */
export enum Operation {
	Continue = "Continue",
	Active = "Active",
	Terminate = "Terminate",
	Unknown = "Unknown",
}

export interface ConnectedPlayer {
	playerId: string;
}

export interface GamePort {
	name: string;
	serverListeningPort: number;
	clientConnectionPort: number;
}

export interface GameServerConnectionInfo {
	publicIpV4Address: string;
	gamePortsConfiguration: GamePort[];
}

/**
 * Snapshot of local state sent on every heartbeat.
 */
export interface HeartbeatRequest {
	currentState: GameState;
	isHealthy: boolean;
	players: ConnectedPlayer[];
}

/**
 * Decoded heartbeat response. Every field is optional; absence means no update.
 */
export interface HeartbeatResponse {
	/** String entries of `sessionConfig` */
	sessionConfig?: Record<string, string>;
	/** String entries of `sessionConfig.metadata` */
	metadata?: Record<string, string>;
	/** `sessionConfig.initialPlayers` */
	initialPlayers?: string[];
	/** Parsed maintenance time, truncated to the second */
	nextScheduledMaintenanceUtc?: Date;
	operation?: Operation;
	/** Operation name exactly as received */
	operationName?: string;
}

export type ShutdownCallback = () => void | Promise<void>;

export type HealthCallback = () => boolean;

export type MaintenanceCallback = (nextMaintenanceUtc: Date) => void;
