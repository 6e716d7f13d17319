import { mkdirSync } from "node:fs";
import { join } from "node:path";
import pino from "pino";
import type { FileDestinationOptions } from "./types";

export type FileDestination = ReturnType<typeof pino.destination>;

/**
 * Resolve the log file path inside a folder, creating the folder when needed.
 *
 * Falls back to the current directory when the folder cannot be created.
 */
export function resolveLogFilePath(folder: string, options: FileDestinationOptions = {}): string {
	const { prefix = "hostbeat", now = () => new Date() } = options;
	const fileName = `${prefix}_output_${Math.floor(now().getTime() / 1000)}.txt`;

	let directory = folder;
	if (directory) {
		try {
			mkdirSync(directory, { recursive: true });
		} catch {
			directory = "";
		}
	}

	return directory ? join(directory, fileName) : fileName;
}

/**
 * Open a synchronous, append-only log file in the given folder.
 *
 * @example
 * ```ts
 * const file = createFileDestination("/var/log/game");
 * const logger = createNodeLogger({ service: "agent" }, file);
 * ```
 */
export function createFileDestination(
	folder: string,
	options: FileDestinationOptions = {},
): FileDestination {
	return pino.destination({ dest: resolveLogFilePath(folder, options), sync: true });
}
