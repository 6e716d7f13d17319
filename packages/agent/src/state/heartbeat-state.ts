import {
	type ConnectedPlayer,
	GameState,
	type HealthCallback,
	type HeartbeatRequest,
	type MaintenanceCallback,
	type ShutdownCallback,
} from "../types";
import { ActivationLatch } from "./activation-latch";
import { HeartbeatSignal } from "./signal";

/**
 * State shared between the public API and the heartbeat loop.
 *
 * Every method runs to completion without awaiting, so each one is an atomic
 * section with respect to the loop. Callbacks are handed out to the caller and
 * never invoked from here.
 */
export class SharedHeartbeatState {
	readonly signal: HeartbeatSignal;
	readonly activation = new ActivationLatch();

	private gameState: GameState = GameState.Initializing;
	private healthy = true;
	private players: ConnectedPlayer[] = [];
	private readonly config = new Map<string, string>();
	private initialPlayers: string[] = [];
	private cachedMaintenance: Date | null = null;

	private shutdownCallback: ShutdownCallback | null = null;
	private healthCallback: HealthCallback | null = null;
	private maintenanceCallback: MaintenanceCallback | null = null;

	constructor(staticSettings: Record<string, string> = {}, signal = new HeartbeatSignal()) {
		this.signal = signal;
		this.mergeConfig(staticSettings);
	}

	getState(): GameState {
		return this.gameState;
	}

	/**
	 * Change the game state. A real change asks the loop for an early heartbeat.
	 *
	 * @returns true when the state changed
	 */
	setState(state: GameState): boolean {
		if (this.gameState === state) {
			return false;
		}
		this.gameState = state;
		this.signal.signal();
		return true;
	}

	isHealthy(): boolean {
		return this.healthy;
	}

	setHealthy(healthy: boolean): void {
		this.healthy = healthy;
	}

	getConnectedPlayers(): ConnectedPlayer[] {
		return this.players.map((player) => ({ playerId: player.playerId }));
	}

	setConnectedPlayers(players: readonly ConnectedPlayer[]): void {
		this.players = players.map((player) => ({ playerId: player.playerId }));
	}

	// Config settings

	getConfigSettings(): Record<string, string> {
		return Object.fromEntries(this.config);
	}

	getConfigValue(key: string): string | undefined {
		return this.config.get(key);
	}

	/**
	 * Insert or overwrite every entry. Keys absent from `entries` are kept.
	 */
	mergeConfig(entries: Record<string, string>): void {
		for (const [key, value] of Object.entries(entries)) {
			this.config.set(key, value);
		}
	}

	getInitialPlayers(): string[] {
		return [...this.initialPlayers];
	}

	/**
	 * Record the initial player list the first time a non-empty one arrives.
	 *
	 * @returns true when the list was adopted
	 */
	adoptInitialPlayers(players: readonly string[]): boolean {
		if (this.initialPlayers.length > 0 || players.length === 0) {
			return false;
		}
		this.initialPlayers = [...players];
		return true;
	}

	// Maintenance

	/**
	 * Whether `next` differs, at second granularity, from the last time delivered.
	 */
	isNewMaintenance(next: Date): boolean {
		if (this.cachedMaintenance === null) {
			return true;
		}
		return toWholeSeconds(this.cachedMaintenance) !== toWholeSeconds(next);
	}

	recordMaintenance(next: Date): void {
		this.cachedMaintenance = new Date(next.getTime());
	}

	getCachedMaintenance(): Date | null {
		return this.cachedMaintenance === null ? null : new Date(this.cachedMaintenance.getTime());
	}

	// Callbacks (single slot each, replaced on registration)

	getShutdownCallback(): ShutdownCallback | null {
		return this.shutdownCallback;
	}

	setShutdownCallback(callback: ShutdownCallback): void {
		this.shutdownCallback = callback;
	}

	getHealthCallback(): HealthCallback | null {
		return this.healthCallback;
	}

	setHealthCallback(callback: HealthCallback): void {
		this.healthCallback = callback;
	}

	getMaintenanceCallback(): MaintenanceCallback | null {
		return this.maintenanceCallback;
	}

	setMaintenanceCallback(callback: MaintenanceCallback): void {
		this.maintenanceCallback = callback;
	}

	/**
	 * Snapshot state, health and players for one heartbeat.
	 */
	snapshotRequest(): HeartbeatRequest {
		return {
			currentState: this.gameState,
			isHealthy: this.healthy,
			players: this.getConnectedPlayers(),
		};
	}
}

function toWholeSeconds(date: Date): number {
	return Math.floor(date.getTime() / 1000);
}
