import { logger } from "@/packages/logger";
import type { Bot, Message } from "./index";

/**
 * Extracts the lowercased command from a message, dropping a `@botname` suffix.
 * Returns null for plain text.
 */
export function parseCommand(text: string): string | null {
	const trimmed = text.trim();
	if (!trimmed.startsWith("/")) return null;
	const head = trimmed.split(/\s+/)[0] ?? "";
	const [command] = head.toLowerCase().split("@");
	return command || null;
}

/**
 * Pattern-based routing:
 * 1. MenuBot: the commands it advertises
 * 2. Other slash commands: ignored
 * 3. AgentBot: everything else, attachments included
 */
export class BotRouter {
	private menuBot?: Bot;
	private agentBot?: Bot;
	private menuCommands: Set<string>;

	constructor(bots: Bot[]) {
		this.menuBot = bots.find((b) => b.name === "MenuBot");
		this.agentBot = bots.find((b) => b.name === "AgentBot");
		this.menuCommands = new Set((this.menuBot?.getMenus() ?? []).map((menu) => `/${menu.command}`));

		if (!this.agentBot) {
			logger.warn("BotRouter: AgentBot not found in bot list");
		}
	}

	route(message: Message): Bot | null {
		const command = parseCommand(message.text);

		if (command === null || (message.attachments?.length ?? 0) > 0) {
			logger.debug({ chatId: message.chatId }, "BotRouter: Natural language → AgentBot");
			return this.agentBot || null;
		}

		if (this.menuCommands.has(command)) {
			logger.debug({ chatId: message.chatId, command }, "BotRouter: Menu command → MenuBot");
			return this.menuBot || null;
		}

		logger.debug({ chatId: message.chatId, command }, "BotRouter: Unknown command ignored");
		return null;
	}
}
