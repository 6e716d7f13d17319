/**
 * Game Server Agent
 *
 * Public facade over the heartbeat engine. Loads configuration once, owns the
 * shared state, the dispatcher and the scheduler, and exposes the operations a
 * game server calls.
 */

import { HeartbeatIntervals, toError } from "@hostbeat/common";
import type { FileDestination, LifecycleLogger, Logger } from "@hostbeat/logger";
import { z } from "zod";
import {
	type AgentConfiguration,
	buildStaticSettings,
	ConfigKeys,
	type ConfigurationSource,
	resolveConfigurationSource,
	validateConfiguration,
} from "./config";
import { OperationDispatcher } from "./dispatcher";
import { type AgentLogging, bindServerIdentity, createAgentLogging } from "./logging";
import { HeartbeatScheduler } from "./scheduler";
import { SharedHeartbeatState } from "./state";
import { FetchHeartbeatTransport, type HeartbeatTransport } from "./transport";
import {
	type ConnectedPlayer,
	type GameServerConnectionInfo,
	GameState,
	type HealthCallback,
	type MaintenanceCallback,
	type ShutdownCallback,
} from "./types";

export const AgentOptionsSchema = z.object({
	/** Milliseconds between heartbeats */
	intervalMs: z.number().int().min(HeartbeatIntervals.MIN_HEARTBEAT_MS).default(HeartbeatIntervals.HEARTBEAT_MS),

	/** Per-request timeout in milliseconds */
	requestTimeoutMs: z.number().int().positive().default(HeartbeatIntervals.REQUEST_TIMEOUT_MS),

	/** Log at debug level, including early-wake notices */
	debugLogs: z.boolean().default(false),
});

export type AgentOptions = z.infer<typeof AgentOptionsSchema>;
export type AgentOptionsInput = z.input<typeof AgentOptionsSchema>;

/**
 * Collaborators for {@link GameServerAgent.create}. Anything omitted is built
 * from the configuration.
 */
export interface GameServerAgentDeps {
	source?: ConfigurationSource;
	/** Logger to use instead of the agent's own; the caller keeps ownership */
	logger?: Logger;
	transport?: HeartbeatTransport;
	options?: AgentOptionsInput;
}

interface AgentParts {
	config: AgentConfiguration;
	logger: Logger;
	ownedLogger: LifecycleLogger | null;
	logFile: FileDestination | null;
	transport: HeartbeatTransport;
	options: AgentOptions;
}

export class GameServerAgent {
	private readonly config: AgentConfiguration;
	private readonly logger: Logger;
	private readonly ownedLogger: LifecycleLogger | null;
	private readonly logFile: FileDestination | null;
	private readonly state: SharedHeartbeatState;
	private readonly dispatcher: OperationDispatcher;
	private readonly scheduler: HeartbeatScheduler;
	private stopping: Promise<void> | null = null;

	private constructor(parts: AgentParts) {
		this.config = parts.config;
		this.logger = parts.logger;
		this.ownedLogger = parts.ownedLogger;
		this.logFile = parts.logFile;
		this.state = new SharedHeartbeatState(buildStaticSettings(parts.config));
		this.dispatcher = new OperationDispatcher({
			state: this.state,
			logger: this.logger,
			onShutdownComplete: () => this.scheduler.halt(),
		});
		this.scheduler = new HeartbeatScheduler({
			state: this.state,
			dispatcher: this.dispatcher,
			transport: parts.transport,
			logger: this.logger,
			intervalMs: parts.options.intervalMs,
		});
	}

	/**
	 * Load and validate configuration and wire the engine. Does not start
	 * heartbeating.
	 *
	 * @throws {ConfigError} when the configuration cannot be loaded or lacks the endpoint or server id
	 */
	static create(deps: GameServerAgentDeps = {}): GameServerAgent {
		const options = AgentOptionsSchema.parse(deps.options ?? {});
		const source = deps.source ?? resolveConfigurationSource();
		const config = source.load();
		validateConfiguration(config);

		let logging: AgentLogging | null = null;
		let baseLogger: Logger;
		if (deps.logger) {
			baseLogger = deps.logger;
		} else {
			logging = createAgentLogging(config, options.debugLogs);
			baseLogger = logging.logger;
		}
		const logger = bindServerIdentity(baseLogger, config);

		const transport =
			deps.transport ??
			new FetchHeartbeatTransport({
				endpoint: config.heartbeatEndpoint,
				serverId: config.serverId,
				timeoutMs: options.requestTimeoutMs,
			});

		const agent = new GameServerAgent({
			config,
			logger,
			ownedLogger: logging?.logger ?? null,
			logFile: logging?.file ?? null,
			transport,
			options,
		});

		logger.info(
			{ source: source.kind, settings: agent.getConfigSettings(), intervalMs: options.intervalMs },
			"Agent configured",
		);
		return agent;
	}

	/**
	 * Start heartbeating. A no-op when the configuration turns heartbeats off
	 * or the loop already runs.
	 *
	 * @returns false once the agent has been stopped
	 */
	start(): boolean {
		if (this.stopping) {
			return false;
		}
		if (!this.config.shouldHeartbeat) {
			this.logger.info("Heartbeats disabled by configuration");
			return true;
		}
		return this.scheduler.start();
	}

	/**
	 * Stop heartbeating, wait for the loop to exit and release the transport
	 * and the agent's own logger. Idempotent.
	 */
	stop(): Promise<void> {
		if (!this.stopping) {
			this.stopping = this.shutdown();
		}
		return this.stopping;
	}

	/**
	 * Report readiness and wait until the orchestrator allocates the server or
	 * asks it to terminate.
	 *
	 * @returns true when the server became active
	 */
	async readyForPlayers(): Promise<boolean> {
		const current = this.state.getState();
		if (current === GameState.Active) {
			return true;
		}
		if (current === GameState.Terminating) {
			return false;
		}

		this.state.setState(GameState.StandingBy);
		this.logger.info("Standing by for players");
		await this.state.activation.wait();
		return this.state.getState() === GameState.Active;
	}

	getGameState(): GameState {
		return this.state.getState();
	}

	getGameServerConnectionInfo(): GameServerConnectionInfo {
		const info = this.config.connectionInfo;
		return {
			publicIpV4Address: info.publicIpV4Address,
			gamePortsConfiguration: info.gamePortsConfiguration.map((port) => ({ ...port })),
		};
	}

	getConfigSettings(): Record<string, string> {
		return this.state.getConfigSettings();
	}

	getInitialPlayers(): string[] {
		return this.state.getInitialPlayers();
	}

	getLogsDirectory(): string {
		return this.state.getConfigValue(ConfigKeys.LOG_FOLDER) ?? "";
	}

	getSharedContentDirectory(): string {
		return this.state.getConfigValue(ConfigKeys.SHARED_CONTENT_FOLDER) ?? "";
	}

	updateConnectedPlayers(players: readonly ConnectedPlayer[]): void {
		this.state.setConnectedPlayers(players);
	}

	registerShutdownCallback(callback: ShutdownCallback): void {
		this.state.setShutdownCallback(callback);
	}

	registerHealthCallback(callback: HealthCallback): void {
		this.state.setHealthCallback(callback);
	}

	registerMaintenanceCallback(callback: MaintenanceCallback): void {
		this.state.setMaintenanceCallback(callback);
	}

	/**
	 * Resolves once a shutdown requested by the orchestrator has run.
	 */
	whenShutdownSettled(): Promise<void> {
		return this.dispatcher.whenShutdownSettled();
	}

	private async shutdown(): Promise<void> {
		await this.scheduler.stop();
		this.logger.info("Agent stopped");

		if (this.ownedLogger) {
			this.ownedLogger.destroy();
		}
		if (this.logFile) {
			try {
				this.logFile.end();
			} catch (error) {
				process.stderr.write(`Failed to close agent log file: ${toError(error).message}\n`);
			}
		}
	}
}
