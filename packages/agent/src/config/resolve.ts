import { existsSync } from "node:fs";
import { envStr } from "@hostbeat/common";
import { EnvironmentConfigurationSource } from "./environment";
import { CONFIG_FILE_ENV, JsonFileConfigurationSource } from "./json-file";
import type { ConfigurationSource } from "./schema";

/**
 * Pick the configuration file when {@link CONFIG_FILE_ENV} names an existing
 * file, otherwise the environment.
 */
export function resolveConfigurationSource(): ConfigurationSource {
	const path = envStr(CONFIG_FILE_ENV, "");
	if (path && existsSync(path)) {
		return new JsonFileConfigurationSource(path);
	}
	return new EnvironmentConfigurationSource();
}
