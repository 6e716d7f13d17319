/**
 * Sample Game Server Host
 *
 * Starts the process-wide heartbeat agent, waits to be allocated and exits
 * once the orchestrator terminates the session.
 */

import { fileURLToPath } from "node:url";
import { Hostbeat } from "@hostbeat/agent";
import { createNodeLogger } from "@hostbeat/logger";
import { loadConfig } from "./config";
import { runSampleHost } from "./host";

export async function main(): Promise<void> {
	const config = loadConfig();
	const logger = createNodeLogger({
		service: config.serviceName,
		level: config.logLevel,
		base: { component: "host" },
	});

	logger.info({ config }, "Sample host starting");

	const shutdown = async (signal: string) => {
		logger.info({ signal }, "Shutting down gracefully...");
		await Hostbeat.stop();
		logger.destroy();
		process.exit(0);
	};

	process.once("SIGTERM", () => {
		shutdown("SIGTERM").catch((err) => logger.error({ err }, "Shutdown failed"));
	});
	process.once("SIGINT", () => {
		shutdown("SIGINT").catch((err) => logger.error({ err }, "Shutdown failed"));
	});

	const result = await runSampleHost({
		logger,
		agent: { options: { intervalMs: config.intervalMs, debugLogs: config.debugLogs } },
	});

	if (!result.started) {
		process.exitCode = 1;
	}
	logger.destroy();
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
	main().catch((err) => {
		console.error("Fatal error:", err);
		process.exit(1);
	});
}
