import { envStr } from "@hostbeat/common";
import { type AgentConfiguration, AgentConfigurationSchema, type ConfigurationSource } from "./schema";

/**
 * Environment variables read by {@link EnvironmentConfigurationSource}.
 */
export const EnvVars = {
	HEARTBEAT_ENDPOINT: "HEARTBEAT_ENDPOINT",
	SESSION_HOST_ID: "SESSION_HOST_ID",
	LOG_FOLDER: "LOG_FOLDER",
	SHARED_CONTENT_FOLDER: "SHARED_CONTENT_FOLDER",
	CERTIFICATE_FOLDER: "CERTIFICATE_FOLDER",
	TITLE_ID: "TITLE_ID",
	BUILD_ID: "BUILD_ID",
	REGION: "REGION",
	PUBLIC_IPV4_ADDRESS: "PUBLIC_IPV4_ADDRESS",
	FULLY_QUALIFIED_DOMAIN_NAME: "FULLY_QUALIFIED_DOMAIN_NAME",
} as const;

/**
 * Configuration taken from environment variables only. Certificates, metadata
 * and ports are unavailable this way and stay empty.
 */
export class EnvironmentConfigurationSource implements ConfigurationSource {
	readonly kind = "environment";

	load(): AgentConfiguration {
		const publicIpV4Address = envStr(EnvVars.PUBLIC_IPV4_ADDRESS, "");

		return AgentConfigurationSchema.parse({
			heartbeatEndpoint: envStr(EnvVars.HEARTBEAT_ENDPOINT, ""),
			serverId: envStr(EnvVars.SESSION_HOST_ID, ""),
			logFolder: envStr(EnvVars.LOG_FOLDER, ""),
			sharedContentFolder: envStr(EnvVars.SHARED_CONTENT_FOLDER, ""),
			certificateFolder: envStr(EnvVars.CERTIFICATE_FOLDER, ""),
			titleId: envStr(EnvVars.TITLE_ID, ""),
			buildId: envStr(EnvVars.BUILD_ID, ""),
			region: envStr(EnvVars.REGION, ""),
			publicIpV4Address,
			fullyQualifiedDomainName: envStr(EnvVars.FULLY_QUALIFIED_DOMAIN_NAME, ""),
			connectionInfo: { publicIpV4Address },
		});
	}
}
