/**
 * Tests for @hostbeat/common/utils/env
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { envBool, envNum, envStr } from "./env";

describe("env utilities", () => {
	let originalEnv: NodeJS.ProcessEnv;

	beforeEach(() => {
		originalEnv = { ...process.env };
	});

	afterEach(() => {
		process.env = originalEnv;
	});

	describe("envBool", () => {
		it("should return true for 'true' (lowercase)", () => {
			process.env.TEST_BOOL = "true";
			expect(envBool("TEST_BOOL", false)).toBe(true);
		});

		it("should return true for 'TRUE' (uppercase)", () => {
			process.env.TEST_BOOL = "TRUE";
			expect(envBool("TEST_BOOL", false)).toBe(true);
		});

		it("should return true for '1'", () => {
			process.env.TEST_BOOL = "1";
			expect(envBool("TEST_BOOL", false)).toBe(true);
		});

		it("should return false for '0'", () => {
			process.env.TEST_BOOL = "0";
			expect(envBool("TEST_BOOL", true)).toBe(false);
		});

		it("should return default when not set", () => {
			delete process.env.TEST_BOOL;
			expect(envBool("TEST_BOOL", true)).toBe(true);
			expect(envBool("TEST_BOOL", false)).toBe(false);
		});
	});

	describe("envNum", () => {
		it("should parse valid integer", () => {
			process.env.TEST_NUM = "42";
			expect(envNum("TEST_NUM", 0)).toBe(42);
		});

		it("should return default for invalid number", () => {
			process.env.TEST_NUM = "not-a-number";
			expect(envNum("TEST_NUM", 100)).toBe(100);
		});

		it("should return default when not set", () => {
			delete process.env.TEST_NUM;
			expect(envNum("TEST_NUM", 3000)).toBe(3000);
		});

		it("should truncate floats to integers", () => {
			process.env.TEST_NUM = "42.7";
			expect(envNum("TEST_NUM", 0)).toBe(42);
		});

		it("should return default for empty string", () => {
			process.env.TEST_NUM = "";
			expect(envNum("TEST_NUM", 123)).toBe(123);
		});
	});

	describe("envStr", () => {
		it("should return string value", () => {
			process.env.TEST_STR = "hello";
			expect(envStr("TEST_STR", "default")).toBe("hello");
		});

		it("should return default when not set", () => {
			delete process.env.TEST_STR;
			expect(envStr("TEST_STR", "default-value")).toBe("default-value");
		});

		it("should keep an empty string", () => {
			process.env.TEST_STR = "";
			expect(envStr("TEST_STR", "default")).toBe("");
		});
	});
});
