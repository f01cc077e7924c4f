import type { Channel } from "@/gateway/channels";
import { userFacingMessage } from "@/packages/errors";
import { logger } from "@/packages/logger";
import { guardAccess } from "./access-guard";
import { BotRouter } from "./bot-router";
import type { Bot, Message } from "./index";

// Telegram redelivers webhook updates it thinks were lost
const MAX_TRACKED_UPDATES = 1000;

/**
 * Common intake for polling and webhook: owner check, duplicate check, routing,
 * and a last-resort error reply.
 */
export class MessageDispatcher {
	private router: BotRouter;
	private seenUpdates = new Set<number>();

	constructor(
		private channel: Channel,
		bots: Bot[],
		private ownerId: number,
	) {
		this.router = new BotRouter(bots);
	}

	async dispatch(message: Message): Promise<void> {
		if (!guardAccess(message, this.ownerId)) return;
		if (this.isDuplicate(message.updateId)) {
			logger.debug({ updateId: message.updateId }, "Ignored duplicate update");
			return;
		}

		logger.info(`[${message.chatId}] ==> ${message.text.replace(/\n/g, "\\n")}`);

		const bot = this.router.route(message);
		if (!bot) return;

		try {
			await bot.handle(message);
		} catch (err) {
			logger.error({ err, bot: bot.name, chatId: message.chatId }, "Bot failed to handle message");
			await this.channel
				.sendMessage(message.chatId, userFacingMessage(err))
				.catch((sendErr: unknown) => logger.error({ err: sendErr }, "Failed to send error reply"));
		}
	}

	private isDuplicate(updateId: number | undefined): boolean {
		if (updateId === undefined) return false;
		if (this.seenUpdates.has(updateId)) return true;
		this.seenUpdates.add(updateId);
		if (this.seenUpdates.size > MAX_TRACKED_UPDATES) {
			const oldest = this.seenUpdates.values().next().value;
			if (oldest !== undefined) this.seenUpdates.delete(oldest);
		}
		return false;
	}
}
