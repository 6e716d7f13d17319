import { type GameServerAgentDeps, Hostbeat } from "@hostbeat/agent";
import type { Logger } from "@hostbeat/logger";

export interface SampleHostDeps {
	logger: Logger;
	/** Passed to the process-wide agent; by default it configures itself */
	agent?: GameServerAgentDeps;
}

export interface SampleHostResult {
	started: boolean;
	activated: boolean;
	initialPlayers: string[];
}

/**
 * Run one session: start the agent, wait to be allocated, admit the initial
 * players and return once the orchestrator asks the server to shut down.
 */
export async function runSampleHost(deps: SampleHostDeps): Promise<SampleHostResult> {
	const logger = deps.logger.child({ component: "sample-host" });

	if (!Hostbeat.start(deps.agent ?? {})) {
		logger.error("Game server agent did not start");
		return { started: false, activated: false, initialPlayers: [] };
	}

	const terminated = new Promise<void>((resolve) => {
		Hostbeat.registerShutdownCallback(() => {
			logger.info("Shutdown requested by the orchestrator");
			resolve();
		});
	});
	Hostbeat.registerHealthCallback(() => true);
	Hostbeat.registerMaintenanceCallback((next) => {
		logger.info({ nextMaintenanceUtc: next.toISOString() }, "Maintenance scheduled");
	});

	const activated = await Hostbeat.readyForPlayers();
	const initialPlayers = Hostbeat.getInitialPlayers();

	if (activated) {
		logger.info(
			{
				settings: Hostbeat.getConfigSettings(),
				connection: Hostbeat.getGameServerConnectionInfo(),
				logsDirectory: Hostbeat.getLogsDirectory(),
			},
			"Server allocated",
		);
		Hostbeat.updateConnectedPlayers(initialPlayers.map((playerId) => ({ playerId })));
	} else {
		logger.info("Terminated before allocation");
	}

	await terminated;
	await Hostbeat.stop();
	logger.info("Session finished");

	return { started: true, activated, initialPlayers };
}
