export type RelayMode = "polling" | "webhook";

export type RelayFileConfig = {
	mode: RelayMode;
	port: number;
	logLevel: string;
	logFormat: string;
	pollTimeoutSeconds: number;
	statusThrottleMs: number;
	messageLimit: number;
	allowedTools: string[];
	downloadsDir: string;
};

const DEFAULT_CONFIG: RelayFileConfig = {
	mode: "polling",
	port: 8080,
	logLevel: "info",
	logFormat: "json",
	pollTimeoutSeconds: 30,
	statusThrottleMs: 3000,
	// Telegram caps messages at 4096 characters; leave room for markup
	messageLimit: 4000,
	allowedTools: ["Bash", "Read", "Write", "Edit", "Glob", "Grep", "WebFetch", "WebSearch", "Task"],
	downloadsDir: "data/downloads",
};

export const RELAY_CONSTANTS = {
	CONFIG: {
		CONFIG_FILE: "data/config/relay.jsonc",
	},
	TELEGRAM: {
		API_BASE: "https://api.telegram.org",
		API_TIMEOUT_MS: 30000,
		MAX_PHOTO_BYTES: 10 * 1024 * 1024,
		MAX_DOCUMENT_BYTES: 50 * 1024 * 1024,
		// getFile refuses anything larger
		MAX_DOWNLOAD_BYTES: 20 * 1024 * 1024,
		TYPING_INTERVAL_MS: 4000,
		SECRET_HEADER: "X-Telegram-Bot-Api-Secret-Token",
	},
	CLAUDE: {
		DEFAULT_BIN: "claude",
		DEFAULT_MODEL: "opus",
		DEFAULT_TIMEOUT_SECONDS: 600,
		// Set by the CLI in its own children; an inherited copy makes it refuse to start
		NESTED_SESSION_ENV: "CLAUDECODE",
		QUEUE_POLL_MS: 1000,
		EXIT_GRACE_MS: 10000,
	},
	STATUS_INITIAL_TEXT: "Working...",
	IMAGE_EXTENSIONS: [".jpg", ".jpeg", ".png", ".gif", ".bmp", ".webp", ".tiff", ".svg"],
	DEFAULT_CONFIG,
};
