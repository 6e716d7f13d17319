/**
 * JSON file configuration source
 *
 * Reads the file the agent writes for each session host. Title id, build id
 * and region are not part of the file and come from the environment.
 */

import { readFileSync } from "node:fs";
import { ConfigError, ErrorCodes, envStr, toError } from "@hostbeat/common";
import { z } from "zod";
import { EnvVars } from "./environment";
import { type AgentConfiguration, AgentConfigurationSchema, type ConfigurationSource, GamePortSchema } from "./schema";

/** Environment variable naming the configuration file */
export const CONFIG_FILE_ENV = "HEARTBEAT_CONFIG_FILE";

const StringMapSchema = z.record(z.string());

/**
 * On-disk layout. Every member is optional; missing required values are caught
 * by validation at agent creation.
 */
export const ConfigFileSchema = z.object({
	heartbeatEndpoint: z.string().optional(),
	sessionHostId: z.string().optional(),
	logFolder: z.string().optional(),
	sharedContentFolder: z.string().optional(),
	certificateFolder: z.string().optional(),
	gameCertificates: StringMapSchema.nullish(),
	buildMetadata: StringMapSchema.nullish(),
	gamePorts: StringMapSchema.nullish(),
	publicIpV4Address: z.string().optional(),
	fullyQualifiedDomainName: z.string().optional(),
	gameServerConnectionInfo: z
		.object({
			publicIpV4Address: z.string().optional(),
			// Spelling emitted by older agents
			publicIpV4Adress: z.string().optional(),
			gamePortsConfiguration: z.array(GamePortSchema).nullish(),
		})
		.nullish(),
});
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export class JsonFileConfigurationSource implements ConfigurationSource {
	readonly kind = "json-file";

	constructor(public readonly path: string) {}

	/**
	 * @throws {ConfigError} when the file cannot be read, is not JSON or has the wrong shape
	 */
	load(): AgentConfiguration {
		const file = this.readFile();
		const connection = file.gameServerConnectionInfo;

		return AgentConfigurationSchema.parse({
			heartbeatEndpoint: file.heartbeatEndpoint,
			serverId: file.sessionHostId,
			logFolder: file.logFolder,
			sharedContentFolder: file.sharedContentFolder,
			certificateFolder: file.certificateFolder,
			titleId: envStr(EnvVars.TITLE_ID, ""),
			buildId: envStr(EnvVars.BUILD_ID, ""),
			region: envStr(EnvVars.REGION, ""),
			publicIpV4Address: file.publicIpV4Address,
			fullyQualifiedDomainName: file.fullyQualifiedDomainName,
			gameCertificates: file.gameCertificates ?? undefined,
			buildMetadata: file.buildMetadata ?? undefined,
			gamePorts: file.gamePorts ?? undefined,
			connectionInfo: {
				publicIpV4Address: connection?.publicIpV4Address ?? connection?.publicIpV4Adress,
				gamePortsConfiguration: connection?.gamePortsConfiguration ?? undefined,
			},
		});
	}

	private readFile(): ConfigFile {
		let raw: string;
		try {
			raw = readFileSync(this.path, "utf8");
		} catch (error) {
			throw new ConfigError(
				`Cannot read configuration file ${this.path}`,
				CONFIG_FILE_ENV,
				toError(error),
				ErrorCodes.CONFIG_READ_FAILED,
			);
		}

		let payload: unknown;
		try {
			payload = JSON.parse(raw);
		} catch (error) {
			throw new ConfigError(
				`Configuration file ${this.path} is not valid JSON`,
				CONFIG_FILE_ENV,
				toError(error),
				ErrorCodes.CONFIG_INVALID,
			);
		}

		const parseResult = ConfigFileSchema.safeParse(payload);
		if (!parseResult.success) {
			throw new ConfigError(
				`Configuration file ${this.path} is malformed: ${parseResult.error.message}`,
				CONFIG_FILE_ENV,
				parseResult.error,
				ErrorCodes.CONFIG_INVALID,
			);
		}
		return parseResult.data;
	}
}
