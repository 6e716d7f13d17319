/**
 * Operation Dispatcher
 *
 * Applies a decoded heartbeat response to shared state: merges config,
 * records initial players, delivers maintenance notices and acts on the
 * operation. User callbacks run outside any state mutation.
 */

import { toError } from "@hostbeat/common";
import type { Logger } from "@hostbeat/logger";
import type { SharedHeartbeatState } from "./state";
import { GameState, type HeartbeatResponse, type MaintenanceCallback, Operation } from "./types";

export interface OperationDispatcherOptions {
	state: SharedHeartbeatState;
	logger: Logger;
	/** Invoked after the shutdown callback settles, to stop further heartbeats */
	onShutdownComplete: () => void;
}

interface MaintenanceNotice {
	callback: MaintenanceCallback;
	nextMaintenanceUtc: Date;
}

export class OperationDispatcher {
	private readonly state: SharedHeartbeatState;
	private readonly logger: Logger;
	private readonly onShutdownComplete: () => void;
	private shutdownTask: Promise<void> | null = null;

	constructor(options: OperationDispatcherOptions) {
		this.state = options.state;
		this.logger = options.logger.child({ component: "dispatcher" });
		this.onShutdownComplete = options.onShutdownComplete;
	}

	dispatch(response: HeartbeatResponse): void {
		const notice = this.applyUpdates(response);

		if (notice) {
			this.notifyMaintenance(notice);
		}

		if (response.operation !== undefined) {
			this.applyOperation(response.operation, response.operationName ?? response.operation);
		}
	}

	/**
	 * Resolves once a shutdown started by a Terminate operation has finished,
	 * or immediately when none was started.
	 */
	whenShutdownSettled(): Promise<void> {
		return this.shutdownTask ?? Promise.resolve();
	}

	private applyUpdates(response: HeartbeatResponse): MaintenanceNotice | null {
		if (response.sessionConfig) {
			this.state.mergeConfig(response.sessionConfig);
		}
		if (response.metadata) {
			this.state.mergeConfig(response.metadata);
		}
		if (response.initialPlayers && this.state.adoptInitialPlayers(response.initialPlayers)) {
			this.logger.info({ count: response.initialPlayers.length }, "Initial players received");
		}

		const next = response.nextScheduledMaintenanceUtc;
		const callback = this.state.getMaintenanceCallback();
		if (next === undefined || callback === null || !this.state.isNewMaintenance(next)) {
			return null;
		}

		this.state.recordMaintenance(next);
		return { callback, nextMaintenanceUtc: next };
	}

	private notifyMaintenance({ callback, nextMaintenanceUtc }: MaintenanceNotice): void {
		this.logger.info({ nextMaintenanceUtc: nextMaintenanceUtc.toISOString() }, "Scheduled maintenance announced");
		try {
			callback(new Date(nextMaintenanceUtc.getTime()));
		} catch (error) {
			this.logger.error({ err: toError(error) }, "Maintenance callback failed");
		}
	}

	private applyOperation(operation: Operation, operationName: string): void {
		this.logger.debug({ operation: operationName, state: this.state.getState() }, "Applying operation");

		switch (operation) {
			case Operation.Continue:
				break;

			case Operation.Active:
				if (this.state.getState() !== GameState.Active) {
					this.state.setState(GameState.Active);
					this.state.activation.release();
					this.logger.info("Server activated");
				}
				break;

			case Operation.Terminate:
				if (this.state.getState() !== GameState.Terminating) {
					this.state.setState(GameState.Terminating);
					this.state.activation.release();
					this.logger.info("Server terminating");
					this.beginShutdown();
				}
				break;

			case Operation.Unknown:
				this.logger.warn({ operation: operationName }, "Unhandled operation received");
				break;
		}
	}

	/**
	 * Run the shutdown callback on its own task so the heartbeat loop keeps
	 * going while it runs.
	 */
	private beginShutdown(): void {
		this.shutdownTask = new Promise<void>((resolve) => setImmediate(resolve))
			.then(async () => {
				const callback = this.state.getShutdownCallback();
				if (callback) {
					await callback();
				}
			})
			.catch((error: unknown) => {
				this.logger.error({ err: toError(error) }, "Shutdown callback failed");
			})
			.finally(() => {
				this.logger.info("Shutdown complete, stopping heartbeats");
				this.onShutdownComplete();
			});
	}
}
