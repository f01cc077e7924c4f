import path from "node:path";
import { z } from "zod";
import { RELAY_CONSTANTS, type RelayFileConfig, type RelayMode } from "@/gateway/consts";
import { ConfigLoader } from "@/packages/config";
import { ConfigurationError } from "@/packages/errors";

const optionalText = z
	.string()
	.optional()
	.transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

/**
 * Environment variables read at startup. Token and owner are required; the rest
 * fall back to the defaults in RELAY_CONSTANTS or the JSONC config file.
 */
export const RelayEnvSchema = z.object({
	TELEGRAM_BOT_TOKEN: z
		.string({ required_error: "TELEGRAM_BOT_TOKEN is required" })
		.trim()
		.min(1, "TELEGRAM_BOT_TOKEN is required"),
	OWNER_TELEGRAM_ID: z
		.string({ required_error: "OWNER_TELEGRAM_ID is required" })
		.trim()
		.regex(/^-?\d+$/, "OWNER_TELEGRAM_ID must be an integer")
		.transform(Number),
	CLAUDE_MODEL: optionalText,
	WORKSPACE_DIR: optionalText,
	COMMAND_TIMEOUT: optionalText.pipe(
		z.coerce
			.number()
			.int()
			.positive("COMMAND_TIMEOUT must be a positive number of seconds")
			// setTimeout takes at most 2^31-1 ms
			.max(2147483, "COMMAND_TIMEOUT must be at most 2147483 seconds")
			.optional(),
	),
	CLAUDE_BIN: optionalText,
	RELAY_MODE: optionalText.pipe(z.enum(["polling", "webhook"]).optional()),
	PORT: optionalText.pipe(z.coerce.number().int().min(1).max(65535).optional()),
	WEBHOOK_URL: optionalText.pipe(z.string().url("WEBHOOK_URL must be a URL").optional()),
	WEBHOOK_SECRET: optionalText,
	LOG_LEVEL: optionalText,
});

export interface Settings {
	botToken: string;
	ownerId: number;
	model: string;
	workspaceDir: string;
	timeoutSeconds: number;
	claudeBin: string;
	allowedTools: string[];
	mode: RelayMode;
	port: number;
	webhookUrl?: string;
	webhookSecret?: string;
	pollTimeoutSeconds: number;
	statusThrottleMs: number;
	messageLimit: number;
	downloadsDir: string;
	logLevel: string;
}

/**
 * Builds the process-wide settings from the environment and the optional JSONC file.
 * @throws {ConfigurationError} when a required variable is missing or a value is malformed
 */
export function loadSettings(
	env: Record<string, string | undefined> = process.env,
	fileConfig: RelayFileConfig = ConfigLoader.load(RELAY_CONSTANTS.CONFIG.CONFIG_FILE, RELAY_CONSTANTS.DEFAULT_CONFIG),
): Settings {
	const parsed = RelayEnvSchema.safeParse(env);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => issue.message);
		throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, issues);
	}

	const vars = parsed.data;
	return {
		botToken: vars.TELEGRAM_BOT_TOKEN,
		ownerId: vars.OWNER_TELEGRAM_ID,
		model: vars.CLAUDE_MODEL ?? RELAY_CONSTANTS.CLAUDE.DEFAULT_MODEL,
		workspaceDir: path.resolve(vars.WORKSPACE_DIR ?? "."),
		timeoutSeconds: vars.COMMAND_TIMEOUT ?? RELAY_CONSTANTS.CLAUDE.DEFAULT_TIMEOUT_SECONDS,
		claudeBin: vars.CLAUDE_BIN ?? RELAY_CONSTANTS.CLAUDE.DEFAULT_BIN,
		allowedTools: fileConfig.allowedTools,
		mode: vars.RELAY_MODE ?? fileConfig.mode,
		port: vars.PORT ?? fileConfig.port,
		webhookUrl: vars.WEBHOOK_URL,
		webhookSecret: vars.WEBHOOK_SECRET,
		pollTimeoutSeconds: fileConfig.pollTimeoutSeconds,
		statusThrottleMs: fileConfig.statusThrottleMs,
		messageLimit: fileConfig.messageLimit,
		downloadsDir: path.resolve(fileConfig.downloadsDir),
		logLevel: vars.LOG_LEVEL ?? fileConfig.logLevel,
	};
}
