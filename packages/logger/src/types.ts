import type { Logger as PinoLogger, LoggerOptions as PinoOptions } from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Identity of the game server a log line belongs to.
 */
export interface ServerContext {
	serverId?: string;
	titleId?: string;
	buildId?: string;
	region?: string;
}

export interface NodeLoggerOptions {
	/** Service name for all logs */
	service: string;
	/** Log level (default: 'info') */
	level?: LogLevel;
	/** Environment name */
	environment?: string;
	/** Service version */
	version?: string;
	/** Enable pretty printing (default: based on NODE_ENV, never with a destination) */
	pretty?: boolean;
	/** Additional redaction paths */
	redactPaths?: readonly string[];
	/** Base context to include in all logs */
	base?: Record<string, unknown>;
	/** Custom Pino options */
	pinoOptions?: Partial<PinoOptions>;
}

export interface FileDestinationOptions {
	/** File name prefix (default: 'hostbeat') */
	prefix?: string;
	/** Clock used for the file name (default: current time) */
	now?: () => Date;
}

export type Logger = PinoLogger;
