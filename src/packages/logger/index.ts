import fs from "node:fs";
import path from "node:path";
import pino, { type Logger, type LoggerOptions } from "pino";

const LOG_DIR = process.env.LOG_DIR || "data/logs";
const LOG_FILE = path.join(LOG_DIR, "relay.log");
const CONFIG_FILE = "data/config/relay.jsonc";

// The config file is read with the full JSONC parser later; this only needs the format
// before the first log line is written.
const detectLogFormat = (): string => {
	if (process.env.LOG_FORMAT) return process.env.LOG_FORMAT;

	try {
		if (fs.existsSync(CONFIG_FILE)) {
			const content = fs.readFileSync(CONFIG_FILE, "utf-8");
			const match = content.match(/"logFormat"\s*:\s*"([^"]+)"/);
			if (match?.[1]) return match[1];
		}
	} catch (_e) {
		// fall through to the default
	}
	return "json";
};

const isTestRun = (): boolean => process.env.NODE_ENV === "test" || process.env.VITEST === "true";

const createLogger = (): Logger => {
	const options: LoggerOptions = {
		level: process.env.LOG_LEVEL || "info",
		base: {
			service: "relay",
			pid: process.pid,
		},
		serializers: {
			err: pino.stdSerializers.err,
		},
		timestamp: pino.stdTimeFunctions.isoTime,
	};

	if (isTestRun()) {
		return pino({ ...options, level: process.env.LOG_LEVEL || "silent" });
	}

	if (!fs.existsSync(LOG_DIR)) {
		fs.mkdirSync(LOG_DIR, { recursive: true });
	}

	const format = detectLogFormat();
	return pino(
		options,
		format === "text"
			? pino.transport({
					target: "pino-pretty",
					options: {
						destination: 1,
						colorize: true,
						translateTime: "SYS:standard",
						singleLine: true,
						ignore: "pid,hostname,service",
						messageFormat: "\x1b[0m[relay] {msg}",
					},
				})
			: pino.transport({
					target: "pino-roll",
					options: {
						file: LOG_FILE,
						frequency: "daily",
						mkdir: true,
					},
				}),
	);
};

export const logger = createLogger();

/**
 * Sets the logger level at runtime.
 */
export const setLogLevel = (level: string) => {
	logger.level = level;
};

export default logger;
