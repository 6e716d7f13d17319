/**
 * Process-wide accessor
 *
 * Module-level functions over a single {@link GameServerAgent}, for hosts that
 * want one agent per process without passing it around. Every function except
 * {@link start} is a safe no-op, or returns an empty value, while no agent runs.
 */

import { createNodeLogger } from "@hostbeat/logger";
import { GameServerAgent, type GameServerAgentDeps } from "./agent";
import type {
	ConnectedPlayer,
	GameServerConnectionInfo,
	GameState,
	HealthCallback,
	MaintenanceCallback,
	ShutdownCallback,
} from "./types";

let instance: GameServerAgent | null = null;

/**
 * Create and start the process-wide agent. Returns true when an agent is
 * already running.
 *
 * @returns false when the agent could not be created; the reason is logged
 */
export function start(deps: GameServerAgentDeps = {}): boolean {
	if (instance) {
		return true;
	}

	try {
		const agent = GameServerAgent.create(deps);
		if (!agent.start()) {
			return false;
		}
		instance = agent;
		return true;
	} catch (error) {
		const logger = deps.logger ?? createNodeLogger({ service: "hostbeat-agent" });
		logger.error({ err: error }, "Failed to start the game server agent");
		return false;
	}
}

/**
 * Stop and forget the process-wide agent.
 */
export async function stop(): Promise<void> {
	const agent = instance;
	instance = null;
	if (agent) {
		await agent.stop();
	}
}

export function getAgent(): GameServerAgent | null {
	return instance;
}

export function readyForPlayers(): Promise<boolean> {
	return instance ? instance.readyForPlayers() : Promise.resolve(false);
}

export function getGameState(): GameState | null {
	return instance ? instance.getGameState() : null;
}

export function getGameServerConnectionInfo(): GameServerConnectionInfo {
	return instance
		? instance.getGameServerConnectionInfo()
		: { publicIpV4Address: "", gamePortsConfiguration: [] };
}

export function getConfigSettings(): Record<string, string> {
	return instance ? instance.getConfigSettings() : {};
}

export function updateConnectedPlayers(players: readonly ConnectedPlayer[]): void {
	instance?.updateConnectedPlayers(players);
}

export function registerShutdownCallback(callback: ShutdownCallback): void {
	instance?.registerShutdownCallback(callback);
}

export function registerHealthCallback(callback: HealthCallback): void {
	instance?.registerHealthCallback(callback);
}

export function registerMaintenanceCallback(callback: MaintenanceCallback): void {
	instance?.registerMaintenanceCallback(callback);
}

export function getLogsDirectory(): string {
	return instance ? instance.getLogsDirectory() : "";
}

export function getSharedContentDirectory(): string {
	return instance ? instance.getSharedContentDirectory() : "";
}

export function getInitialPlayers(): string[] {
	return instance ? instance.getInitialPlayers() : [];
}
