/**
 * Configuration sources for the heartbeat agent.
 *
 * @module @hostbeat/agent/config
 */

export { EnvironmentConfigurationSource, EnvVars } from "./environment";
export { InMemoryConfigurationSource } from "./in-memory";
export type { ConfigFile } from "./json-file";
export { CONFIG_FILE_ENV, ConfigFileSchema, JsonFileConfigurationSource } from "./json-file";
export { resolveConfigurationSource } from "./resolve";
export type { AgentConfiguration, AgentConfigurationInput, ConfigurationSource } from "./schema";
export {
	AgentConfigurationSchema,
	buildStaticSettings,
	ConnectionInfoSchema,
	GamePortSchema,
	validateConfiguration,
} from "./schema";
export type { ConfigKey } from "./settings";
export { ConfigKeys } from "./settings";
