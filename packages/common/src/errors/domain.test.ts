/**
 * Tests for @hostbeat/common/errors/domain
 */

import { describe, expect, it } from "vitest";
import { HostbeatError } from "./base";
import { ConfigError, DecodeError, ErrorCodes, TransportError } from "./domain";

describe("ErrorCodes", () => {
	it("should export all error codes", () => {
		expect(ErrorCodes.CONFIG_MISSING_SETTING).toBe("CONFIG_MISSING_SETTING");
		expect(ErrorCodes.CONFIG_INVALID).toBe("CONFIG_INVALID");
		expect(ErrorCodes.CONFIG_READ_FAILED).toBe("CONFIG_READ_FAILED");
		expect(ErrorCodes.TRANSPORT_REQUEST_FAILED).toBe("TRANSPORT_REQUEST_FAILED");
		expect(ErrorCodes.TRANSPORT_TIMEOUT).toBe("TRANSPORT_TIMEOUT");
		expect(ErrorCodes.TRANSPORT_BAD_STATUS).toBe("TRANSPORT_BAD_STATUS");
		expect(ErrorCodes.DECODE_INVALID_JSON).toBe("DECODE_INVALID_JSON");
		expect(ErrorCodes.DECODE_SCHEMA_MISMATCH).toBe("DECODE_SCHEMA_MISMATCH");
	});
});

describe("ConfigError", () => {
	it("should default to the missing-setting code", () => {
		// Act
		const error = new ConfigError("Heartbeat endpoint is required", "heartbeatEndpoint");

		// Assert
		expect(error.name).toBe("ConfigError");
		expect(error.code).toBe(ErrorCodes.CONFIG_MISSING_SETTING);
		expect(error.setting).toBe("heartbeatEndpoint");
		expect(error).toBeInstanceOf(HostbeatError);
	});

	it("should accept an explicit code and serialize the setting", () => {
		// Arrange
		const cause = new Error("ENOENT");

		// Act
		const error = new ConfigError("Cannot read file", "configFile", cause, ErrorCodes.CONFIG_READ_FAILED);

		// Assert
		expect(error.code).toBe(ErrorCodes.CONFIG_READ_FAILED);
		expect(error.toJSON()).toMatchObject({
			name: "ConfigError",
			setting: "configFile",
			cause: { name: "Error", message: "ENOENT" },
		});
	});
});

describe("TransportError", () => {
	it("should build a bad-status error with status and body", () => {
		// Act
		const error = TransportError.badStatus(503, "Service Unavailable");

		// Assert
		expect(error.code).toBe(ErrorCodes.TRANSPORT_BAD_STATUS);
		expect(error.status).toBe(503);
		expect(error.body).toBe("Service Unavailable");
		expect(error.message).toBe("Received non-success code from agent. Status code: 503");
	});

	it("should truncate long bodies to 500 characters", () => {
		const error = TransportError.badStatus(500, "x".repeat(800));

		expect(error.body).toHaveLength(500);
	});

	it("should default to the request-failed code", () => {
		const error = new TransportError("connect ECONNREFUSED");

		expect(error.code).toBe(ErrorCodes.TRANSPORT_REQUEST_FAILED);
		expect(error.status).toBeUndefined();
		expect(error.toJSON()).toMatchObject({ status: undefined, body: undefined });
	});
});

describe("DecodeError", () => {
	it("should keep truncated input", () => {
		// Act
		const error = new DecodeError("Failed to parse heartbeat", "{".repeat(600));

		// Assert
		expect(error.name).toBe("DecodeError");
		expect(error.code).toBe(ErrorCodes.DECODE_INVALID_JSON);
		expect(error.input).toHaveLength(500);
	});

	it("should accept the schema-mismatch code", () => {
		const error = new DecodeError("Bad shape", "{}", undefined, ErrorCodes.DECODE_SCHEMA_MISMATCH);

		expect(error.code).toBe(ErrorCodes.DECODE_SCHEMA_MISMATCH);
		expect(error.toJSON()).toMatchObject({ input: "{}" });
	});
});
