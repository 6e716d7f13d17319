import pino, { type DestinationStream } from "pino";
import { mergeRedactPaths } from "./redaction";
import type { Logger, NodeLoggerOptions, ServerContext } from "./types";

/**
 * Logger with an explicit end of life.
 */
export type LifecycleLogger = Logger & {
	/** Drop every log call made after this point. Idempotent. */
	destroy: () => void;
};

/**
 * Create a Pino logger for Node.js environments.
 *
 * Features:
 * - Uppercase severity levels
 * - ISO timestamps
 * - Redaction via Pino's built-in redaction
 * - Pretty printing in development (stdout only)
 * - Structured JSON otherwise
 * - destroy() to stop logging once the owner shuts down
 */
export function createNodeLogger(
	options: NodeLoggerOptions,
	destination?: DestinationStream,
): LifecycleLogger {
	const {
		service,
		level = "info",
		environment = process.env.NODE_ENV || "development",
		version = process.env.npm_package_version,
		pretty = destination === undefined && environment === "development",
		redactPaths,
		base = {},
		pinoOptions = {},
	} = options;

	let destroyed = false;

	// Pino refuses a transport together with an explicit destination
	const transport =
		pretty && destination === undefined
			? {
					target: "pino-pretty",
					options: {
						colorize: true,
						translateTime: "SYS:standard",
						ignore: "pid,hostname",
						levelFirst: true,
						messageFormat: "{component} - {msg}",
					},
				}
			: undefined;

	const logger = pino(
		{
			level,
			formatters: {
				level(label) {
					const severityMap: Record<string, string> = {
						debug: "DEBUG",
						info: "INFO",
						warn: "WARNING",
						error: "ERROR",
					};
					return { severity: severityMap[label] || label.toUpperCase() };
				},
				bindings(bindings) {
					const { pid: _pid, hostname: _hostname, ...rest } = bindings;
					return {
						service,
						environment,
						...(version && { version }),
						...base,
						...rest,
					};
				},
			},
			timestamp: pino.stdTimeFunctions.isoTime,
			redact: {
				paths: [...mergeRedactPaths(redactPaths)],
				censor: "[REDACTED]",
			},
			hooks: {
				logMethod(inputArgs, method) {
					if (destroyed) {
						return;
					}
					method.apply(this, inputArgs);
				},
			},
			...(transport && { transport }),
			...pinoOptions,
		},
		destination,
	);

	return Object.assign(logger, {
		destroy: () => {
			if (destroyed) return;
			logger.flush();
			destroyed = true;
		},
	});
}

/**
 * Create a child logger carrying the game server's identity.
 *
 * @param logger - Parent logger
 * @param server - Identity reported by the configuration source
 */
export function withServerContext(logger: Logger, server: ServerContext): Logger {
	return logger.child({
		...(server.serverId && { server_id: server.serverId }),
		...(server.titleId && { title_id: server.titleId }),
		...(server.buildId && { build_id: server.buildId }),
		...(server.region && { region: server.region }),
	});
}
