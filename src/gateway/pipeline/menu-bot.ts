import type { Channel } from "@/gateway/channels";
import { clearDownloads } from "@/gateway/services/file-acceptor";
import type { SessionStore } from "@/gateway/session";
import { logger } from "@/packages/logger";
import { parseCommand } from "./bot-router";
import type { Bot, Message } from "./index";

export interface MenuBotOptions {
	downloadsDir: string;
}

export class MenuBot implements Bot {
	name = "MenuBot";

	static readonly MENU_COMMANDS = [
		{ command: "start", description: "Check the relay is online" },
		{ command: "clear", description: "Start a fresh Claude session" },
		{ command: "status", description: "Show session info" },
	];

	constructor(
		private channel: Channel,
		private session: SessionStore,
		private options: MenuBotOptions,
	) {}

	getMenus() {
		return MenuBot.MENU_COMMANDS;
	}

	/**
	 * Aggregates menus from all bots in the chain.
	 */
	static getAllMenus(bots: Bot[]): { command: string; description: string }[] {
		return bots.flatMap((bot) => bot.getMenus());
	}

	async handle(message: Message): Promise<boolean> {
		const command = parseCommand(message.text);
		if (!command) return false;

		switch (command) {
			case "/start":
				await this.channel.sendMessage(message.chatId, "Claude relay online. Send me anything.");
				return true;

			case "/clear":
				await this.handleClear(message);
				return true;

			case "/status": {
				const snapshot = this.session.snapshot();
				await this.channel.sendMessage(
					message.chatId,
					`Session: ${this.session.describe()}\nMessages: ${snapshot.messageCount}\nModel: ${snapshot.model}`,
				);
				return true;
			}
		}

		return false;
	}

	private async handleClear(message: Message): Promise<void> {
		this.session.clear();
		try {
			await clearDownloads(this.options.downloadsDir);
		} catch (err) {
			logger.error({ err, dir: this.options.downloadsDir }, "Failed to clear downloads");
		}
		logger.info({ chatId: message.chatId }, "Session cleared");
		await this.channel.sendMessage(message.chatId, "Session reset. Next message starts fresh.");
	}
}
