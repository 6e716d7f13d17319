/**
 * Configuration source tests
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError, ErrorCodes } from "@hostbeat/common";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EnvironmentConfigurationSource } from "./environment";
import { InMemoryConfigurationSource } from "./in-memory";
import { CONFIG_FILE_ENV, JsonFileConfigurationSource } from "./json-file";
import { resolveConfigurationSource } from "./resolve";
import { AgentConfigurationSchema, buildStaticSettings, validateConfiguration } from "./schema";

const MANAGED_ENV = [
	CONFIG_FILE_ENV,
	"HEARTBEAT_ENDPOINT",
	"SESSION_HOST_ID",
	"LOG_FOLDER",
	"SHARED_CONTENT_FOLDER",
	"CERTIFICATE_FOLDER",
	"TITLE_ID",
	"BUILD_ID",
	"REGION",
	"PUBLIC_IPV4_ADDRESS",
	"FULLY_QUALIFIED_DOMAIN_NAME",
];

function captureError(fn: () => unknown): unknown {
	try {
		fn();
	} catch (error) {
		return error;
	}
	return undefined;
}

describe("configuration", () => {
	let saved: Record<string, string | undefined>;
	let workDir: string;

	beforeEach(() => {
		saved = Object.fromEntries(MANAGED_ENV.map((key) => [key, process.env[key]]));
		for (const key of MANAGED_ENV) {
			delete process.env[key];
		}
		workDir = mkdtempSync(join(tmpdir(), "hostbeat-config-"));
	});

	afterEach(() => {
		for (const key of MANAGED_ENV) {
			const value = saved[key];
			if (value === undefined) {
				delete process.env[key];
			} else {
				process.env[key] = value;
			}
		}
		rmSync(workDir, { recursive: true, force: true });
	});

	function writeConfig(contents: unknown): string {
		const path = join(workDir, "config.json");
		writeFileSync(path, typeof contents === "string" ? contents : JSON.stringify(contents));
		return path;
	}

	describe("JsonFileConfigurationSource", () => {
		it("should read the file and take identity from the environment", () => {
			// Arrange
			process.env.TITLE_ID = "title-1";
			process.env.BUILD_ID = "build-1";
			process.env.REGION = "WestEurope";
			const path = writeConfig({
				heartbeatEndpoint: "localhost:56001",
				sessionHostId: "server-1",
				logFolder: "/data/logs",
				sharedContentFolder: "/data/shared",
				certificateFolder: "/data/certs",
				gameCertificates: { tls: "thumbprint" },
				buildMetadata: { mode: "ranked" },
				gamePorts: { game: "7777" },
				publicIpV4Address: "203.0.113.7",
				fullyQualifiedDomainName: "host.example.test",
				gameServerConnectionInfo: {
					publicIpV4Adress: "203.0.113.7",
					gamePortsConfiguration: [{ name: "game", serverListeningPort: 7777, clientConnectionPort: 30000 }],
				},
				unrelated: true,
			});

			// Act
			const config = new JsonFileConfigurationSource(path).load();

			// Assert
			expect(config).toEqual({
				heartbeatEndpoint: "localhost:56001",
				serverId: "server-1",
				logFolder: "/data/logs",
				sharedContentFolder: "/data/shared",
				certificateFolder: "/data/certs",
				titleId: "title-1",
				buildId: "build-1",
				region: "WestEurope",
				publicIpV4Address: "203.0.113.7",
				fullyQualifiedDomainName: "host.example.test",
				gameCertificates: { tls: "thumbprint" },
				buildMetadata: { mode: "ranked" },
				gamePorts: { game: "7777" },
				connectionInfo: {
					publicIpV4Address: "203.0.113.7",
					gamePortsConfiguration: [{ name: "game", serverListeningPort: 7777, clientConnectionPort: 30000 }],
				},
				shouldLog: true,
				shouldHeartbeat: true,
			});
		});

		it("should fill defaults for missing members", () => {
			const config = new JsonFileConfigurationSource(writeConfig({ heartbeatEndpoint: "agent:80" })).load();

			expect(config.serverId).toBe("");
			expect(config.gamePorts).toEqual({});
			expect(config.connectionInfo).toEqual({ publicIpV4Address: "", gamePortsConfiguration: [] });
		});

		it("should report a missing file", () => {
			const error = captureError(() => new JsonFileConfigurationSource(join(workDir, "absent.json")).load());

			expect(error).toBeInstanceOf(ConfigError);
			expect(error).toMatchObject({ code: ErrorCodes.CONFIG_READ_FAILED, setting: CONFIG_FILE_ENV });
		});

		it("should report invalid JSON", () => {
			const error = captureError(() => new JsonFileConfigurationSource(writeConfig("{broken")).load());

			expect(error).toMatchObject({ code: ErrorCodes.CONFIG_INVALID });
		});

		it("should report a malformed layout", () => {
			const error = captureError(() =>
				new JsonFileConfigurationSource(writeConfig({ gamePorts: { game: 7777 } })).load(),
			);

			expect(error).toBeInstanceOf(ConfigError);
			expect(error).toMatchObject({ code: ErrorCodes.CONFIG_INVALID });
		});
	});

	describe("EnvironmentConfigurationSource", () => {
		it("should read every variable", () => {
			process.env.HEARTBEAT_ENDPOINT = "agent:56001";
			process.env.SESSION_HOST_ID = "server-2";
			process.env.LOG_FOLDER = "/logs";
			process.env.PUBLIC_IPV4_ADDRESS = "198.51.100.4";

			const config = new EnvironmentConfigurationSource().load();

			expect(config).toMatchObject({
				heartbeatEndpoint: "agent:56001",
				serverId: "server-2",
				logFolder: "/logs",
				sharedContentFolder: "",
				publicIpV4Address: "198.51.100.4",
				connectionInfo: { publicIpV4Address: "198.51.100.4", gamePortsConfiguration: [] },
				shouldLog: true,
				shouldHeartbeat: true,
			});
		});
	});

	describe("InMemoryConfigurationSource", () => {
		it("should default logging and heartbeating off", () => {
			const config = new InMemoryConfigurationSource({ heartbeatEndpoint: "agent:80", serverId: "s" }).load();

			expect(config.shouldLog).toBe(false);
			expect(config.shouldHeartbeat).toBe(false);
		});

		it("should honor explicit switches", () => {
			const config = new InMemoryConfigurationSource({ shouldHeartbeat: true }).load();

			expect(config.shouldHeartbeat).toBe(true);
		});
	});

	describe("resolveConfigurationSource", () => {
		it("should prefer an existing configuration file", () => {
			process.env[CONFIG_FILE_ENV] = writeConfig({});

			const source = resolveConfigurationSource();

			expect(source).toBeInstanceOf(JsonFileConfigurationSource);
			expect(source.kind).toBe("json-file");
		});

		it("should fall back to the environment", () => {
			process.env[CONFIG_FILE_ENV] = join(workDir, "missing.json");

			expect(resolveConfigurationSource()).toBeInstanceOf(EnvironmentConfigurationSource);
		});

		it("should use the environment when no file is named", () => {
			expect(resolveConfigurationSource().kind).toBe("environment");
		});
	});

	describe("validateConfiguration", () => {
		it("should require the heartbeat endpoint", () => {
			const config = AgentConfigurationSchema.parse({ serverId: "server-1" });

			const error = captureError(() => validateConfiguration(config));

			expect(error).toBeInstanceOf(ConfigError);
			expect(error).toMatchObject({ code: ErrorCodes.CONFIG_MISSING_SETTING, setting: "gsmsBaseUrl" });
		});

		it("should require the server id", () => {
			const config = AgentConfigurationSchema.parse({ heartbeatEndpoint: "agent:80" });

			expect(captureError(() => validateConfiguration(config))).toMatchObject({ setting: "instanceId" });
		});

		it("should accept a complete configuration", () => {
			const config = AgentConfigurationSchema.parse({ heartbeatEndpoint: "agent:80", serverId: "server-1" });

			expect(() => validateConfiguration(config)).not.toThrow();
		});
	});

	describe("buildStaticSettings", () => {
		it("should let named keys win over flattened maps", () => {
			const config = AgentConfigurationSchema.parse({
				heartbeatEndpoint: "agent:80",
				serverId: "server-1",
				region: "EastUs",
				gameCertificates: { tls: "thumbprint" },
				buildMetadata: { region: "from-metadata", mode: "ranked" },
				gamePorts: { game: "7777" },
			});

			const settings = buildStaticSettings(config);

			expect(settings).toEqual({
				tls: "thumbprint",
				mode: "ranked",
				game: "7777",
				gsmsBaseUrl: "agent:80",
				instanceId: "server-1",
				logFolder: "",
				sharedContentFolder: "",
				certificateFolder: "",
				titleId: "",
				buildId: "",
				region: "EastUs",
				publicIpV4Address: "",
				fullyQualifiedDomainName: "",
			});
		});
	});
});
