import fs from "node:fs";
import { type ParseError, parse, printParseErrorCode } from "jsonc-parser";
import { logger } from "@/packages/logger";

export function isRecord(value: unknown): value is Record<string, unknown> {
	return !!value && typeof value === "object" && !Array.isArray(value);
}

/**
 * Merges a parsed config object over its defaults. Nested objects merge key by key;
 * arrays and scalars from the parsed side replace the default outright.
 */
export function deepMerge<T extends Record<string, unknown>>(defaults: T, parsed: Record<string, unknown>): T {
	const merged: Record<string, unknown> = { ...defaults };
	for (const [key, parsedValue] of Object.entries(parsed)) {
		const defaultValue = merged[key];
		if (isRecord(defaultValue) && isRecord(parsedValue)) {
			merged[key] = deepMerge(defaultValue, parsedValue);
			continue;
		}
		merged[key] = parsedValue;
	}
	return merged as T;
}

/**
 * Loads a JSONC configuration file over a set of defaults.
 * A missing or unreadable file leaves the defaults untouched.
 */
export function loadConfig<T extends Record<string, unknown>>(configPath: string, defaults: T): T {
	try {
		if (!fs.existsSync(configPath)) {
			logger.debug({ configPath }, "Configuration file not found, using defaults");
			return defaults;
		}

		const content = fs.readFileSync(configPath, "utf-8");
		const errors: ParseError[] = [];
		const parsed: unknown = parse(content, errors, { allowTrailingComma: true });

		if (errors.length > 0 || !isRecord(parsed)) {
			logger.error(
				{ configPath, errors: errors.map((e) => printParseErrorCode(e.error)) },
				"Failed to parse configuration file or invalid JSONC",
			);
			return defaults;
		}

		logger.info({ configPath }, "Configuration loaded successfully");
		return deepMerge(defaults, parsed);
	} catch (error) {
		logger.error({ configPath, err: error }, "Error loading configuration");
		return defaults;
	}
}

export const ConfigLoader = {
	load: loadConfig,
} as const;
