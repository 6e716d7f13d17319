import { ConfigError, ErrorCodes } from "@hostbeat/common";
import {
	type AgentConfiguration,
	type AgentConfigurationInput,
	AgentConfigurationSchema,
	type ConfigurationSource,
} from "./schema";

/**
 * Configuration handed over directly, for tests and embedding. Logging to a
 * file and heartbeating are off unless turned on explicitly.
 */
export class InMemoryConfigurationSource implements ConfigurationSource {
	readonly kind = "in-memory";

	constructor(private readonly settings: AgentConfigurationInput = {}) {}

	load(): AgentConfiguration {
		const parseResult = AgentConfigurationSchema.safeParse({
			...this.settings,
			shouldLog: this.settings.shouldLog ?? false,
			shouldHeartbeat: this.settings.shouldHeartbeat ?? false,
		});
		if (!parseResult.success) {
			throw new ConfigError(
				`Invalid in-memory configuration: ${parseResult.error.message}`,
				undefined,
				parseResult.error,
				ErrorCodes.CONFIG_INVALID,
			);
		}
		return parseResult.data;
	}
}
