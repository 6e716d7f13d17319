/**
 * Agent configuration schema
 *
 * Every configuration source produces an {@link AgentConfiguration}; missing
 * strings default to empty and are checked by {@link validateConfiguration}.
 */

import { ConfigError } from "@hostbeat/common";
import { z } from "zod";
import { ConfigKeys } from "./settings";

const StringMapSchema = z.record(z.string());

export const GamePortSchema = z.object({
	name: z.string(),
	serverListeningPort: z.number().int().min(0).max(65535),
	clientConnectionPort: z.number().int().min(0).max(65535),
});

export const ConnectionInfoSchema = z.object({
	publicIpV4Address: z.string().default(""),
	gamePortsConfiguration: z.array(GamePortSchema).default([]),
});

export const AgentConfigurationSchema = z.object({
	/** Agent host and port receiving heartbeats */
	heartbeatEndpoint: z.string().default(""),

	/** Session host id the agent knows this server by */
	serverId: z.string().default(""),

	logFolder: z.string().default(""),
	sharedContentFolder: z.string().default(""),
	certificateFolder: z.string().default(""),
	titleId: z.string().default(""),
	buildId: z.string().default(""),
	region: z.string().default(""),
	publicIpV4Address: z.string().default(""),
	fullyQualifiedDomainName: z.string().default(""),

	/** Certificate name to thumbprint or path */
	gameCertificates: StringMapSchema.default({}),
	buildMetadata: StringMapSchema.default({}),
	/** Port name to port number, as strings */
	gamePorts: StringMapSchema.default({}),

	connectionInfo: ConnectionInfoSchema.default({}),

	/** Write logs to a file in the log folder */
	shouldLog: z.boolean().default(true),

	/** Run the heartbeat loop */
	shouldHeartbeat: z.boolean().default(true),
});

export type AgentConfiguration = z.infer<typeof AgentConfigurationSchema>;
export type AgentConfigurationInput = z.input<typeof AgentConfigurationSchema>;

/**
 * Supplies the agent's configuration, read once at startup.
 */
export interface ConfigurationSource {
	/** Short label used in logs */
	readonly kind: string;

	/**
	 * @throws {ConfigError} when the source cannot be read or is malformed
	 */
	load(): AgentConfiguration;
}

/**
 * Reject configurations the agent cannot heartbeat with.
 *
 * @throws {ConfigError}
 */
export function validateConfiguration(config: AgentConfiguration): void {
	if (!config.heartbeatEndpoint) {
		throw new ConfigError("Heartbeat endpoint is not configured", ConfigKeys.HEARTBEAT_ENDPOINT);
	}
	if (!config.serverId) {
		throw new ConfigError("Server id is not configured", ConfigKeys.SERVER_ID);
	}
}

/**
 * Flatten a configuration into the static settings map. Certificates, build
 * metadata and ports go in first, so the named keys win on collision.
 */
export function buildStaticSettings(config: AgentConfiguration): Record<string, string> {
	return {
		...config.gameCertificates,
		...config.buildMetadata,
		...config.gamePorts,
		[ConfigKeys.HEARTBEAT_ENDPOINT]: config.heartbeatEndpoint,
		[ConfigKeys.SERVER_ID]: config.serverId,
		[ConfigKeys.LOG_FOLDER]: config.logFolder,
		[ConfigKeys.SHARED_CONTENT_FOLDER]: config.sharedContentFolder,
		[ConfigKeys.CERTIFICATE_FOLDER]: config.certificateFolder,
		[ConfigKeys.TITLE_ID]: config.titleId,
		[ConfigKeys.BUILD_ID]: config.buildId,
		[ConfigKeys.REGION]: config.region,
		[ConfigKeys.PUBLIC_IPV4_ADDRESS]: config.publicIpV4Address,
		[ConfigKeys.FULLY_QUALIFIED_DOMAIN_NAME]: config.fullyQualifiedDomainName,
	};
}
