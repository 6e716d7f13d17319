/**
 * Keys under which static configuration appears in the config settings map.
 */
export const ConfigKeys = {
	HEARTBEAT_ENDPOINT: "gsmsBaseUrl",
	SERVER_ID: "instanceId",
	LOG_FOLDER: "logFolder",
	SHARED_CONTENT_FOLDER: "sharedContentFolder",
	CERTIFICATE_FOLDER: "certificateFolder",
	TITLE_ID: "titleId",
	BUILD_ID: "buildId",
	REGION: "region",
	PUBLIC_IPV4_ADDRESS: "publicIpV4Address",
	FULLY_QUALIFIED_DOMAIN_NAME: "fullyQualifiedDomainName",
} as const;

export type ConfigKey = (typeof ConfigKeys)[keyof typeof ConfigKeys];
