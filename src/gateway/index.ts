import "dotenv/config";
import fs from "node:fs/promises";
import { serve } from "@hono/node-server";
import { createApp } from "@/gateway/app";
import { TelegramPoller } from "@/gateway/channels/poller";
import { TelegramChannel } from "@/gateway/channels/telegram";
import { AgentBot } from "@/gateway/pipeline/agent-bot";
import { MessageDispatcher } from "@/gateway/pipeline/dispatcher";
import { MenuBot } from "@/gateway/pipeline/menu-bot";
import { ClaudeExecutor } from "@/gateway/services/claude-executor";
import { SessionStore } from "@/gateway/session";
import { loadSettings, type Settings } from "@/gateway/settings";
import { ConfigurationError } from "@/packages/errors";
import { logger, setLogLevel } from "@/packages/logger";

let settings: Settings;
try {
	settings = loadSettings();
} catch (err) {
	if (err instanceof ConfigurationError) {
		logger.fatal({ issues: err.issues }, err.message);
		process.exit(1);
	}
	throw err;
}

setLogLevel(settings.logLevel);
await fs.mkdir(settings.downloadsDir, { recursive: true });

// Initialize Channel, Session and Bots
const telegram = new TelegramChannel(settings.botToken);
const session = new SessionStore(settings.model);
const executor = new ClaudeExecutor({
	model: settings.model,
	allowedTools: settings.allowedTools,
	workspaceDir: settings.workspaceDir,
	claudeBin: settings.claudeBin,
	timeoutSeconds: settings.timeoutSeconds,
	statusThrottleMs: settings.statusThrottleMs,
	messageLimit: settings.messageLimit,
});
const bots = [
	new MenuBot(telegram, session, { downloadsDir: settings.downloadsDir }),
	new AgentBot(telegram, session, executor, {
		workspaceDir: settings.workspaceDir,
		downloadsDir: settings.downloadsDir,
		messageLimit: settings.messageLimit,
	}),
];
const dispatcher = new MessageDispatcher(telegram, bots, settings.ownerId);

// Initialize Telegram Menu
telegram
	.setMenu(MenuBot.getAllMenus(bots))
	.then(() => logger.info("Telegram bot menu updated"))
	.catch((err: unknown) => logger.error({ err }, "Failed to update Telegram bot menu"));

logger.info(
	{ model: settings.model, workspace: settings.workspaceDir, timeoutSeconds: settings.timeoutSeconds },
	`Relay starting in ${settings.mode} mode`,
);

const app = createApp({
	adapter: telegram,
	dispatcher,
	secret: settings.webhookSecret,
	mode: settings.mode,
	session,
});

let poller: TelegramPoller | undefined;
if (settings.mode === "polling") {
	poller = new TelegramPoller(telegram, {
		timeoutSeconds: settings.pollTimeoutSeconds,
		onMessage: (message) => {
			dispatcher.dispatch(message).catch((err: unknown) => logger.error({ err }, "Message processing failed"));
		},
	});
	await poller.start();
}

// Webhook mode needs the server for updates; polling mode keeps it for /health
const server = serve({ fetch: app.fetch, port: settings.port }, (info) => {
	logger.info({ port: info.port }, "HTTP server listening");
});

if (settings.mode === "webhook") {
	if (settings.webhookUrl) {
		await telegram.getClient().setWebhook(settings.webhookUrl, settings.webhookSecret);
		logger.info({ url: settings.webhookUrl }, "Telegram webhook registered");
	} else {
		logger.warn("WEBHOOK_URL is not set; expecting the webhook to be registered already");
	}
}

// Graceful Shutdown
const shutdown = async (signal: string) => {
	logger.info({ signal }, "Shutdown signal received. Closing resources...");
	await poller?.stop();
	server.close();
	logger.info("Relay shutdown complete.");
	process.exit(0);
};

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));
