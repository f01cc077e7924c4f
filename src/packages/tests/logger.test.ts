import { afterEach, describe, expect, test } from "vitest";
import { logger, setLogLevel } from "@/packages/logger";

describe("logger", () => {
	const initial = logger.level;

	afterEach(() => {
		setLogLevel(initial);
	});

	test("is silent under test unless LOG_LEVEL says otherwise", () => {
		expect(initial).toBe(process.env.LOG_LEVEL || "silent");
	});

	test("setLogLevel changes the level at runtime", () => {
		setLogLevel("debug");
		expect(logger.level).toBe("debug");
		expect(logger.isLevelEnabled("debug")).toBe(true);
		expect(logger.isLevelEnabled("trace")).toBe(false);
	});
});
