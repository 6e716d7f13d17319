import {
	createFileDestination,
	createNodeLogger,
	type FileDestination,
	type LifecycleLogger,
	type Logger,
	withServerContext,
} from "@hostbeat/logger";
import type { AgentConfiguration } from "./config";

export interface AgentLogging {
	logger: LifecycleLogger;
	/** Open log file, when the configuration asks for one */
	file: FileDestination | null;
}

/**
 * Build the logger an agent owns: JSON lines into `<logFolder>/hostbeat_output_<unixSeconds>.txt`
 * when `shouldLog` is set, stdout otherwise.
 */
export function createAgentLogging(config: AgentConfiguration, debugLogs: boolean): AgentLogging {
	const file = config.shouldLog ? createFileDestination(config.logFolder) : null;
	const logger = createNodeLogger(
		{
			service: "hostbeat-agent",
			level: debugLogs ? "debug" : "info",
			base: { component: "agent" },
		},
		file ?? undefined,
	);
	return { logger, file };
}

/**
 * Attach the server's identity to every line the agent writes.
 */
export function bindServerIdentity(logger: Logger, config: AgentConfiguration): Logger {
	return withServerContext(logger, {
		serverId: config.serverId,
		titleId: config.titleId,
		buildId: config.buildId,
		region: config.region,
	});
}
