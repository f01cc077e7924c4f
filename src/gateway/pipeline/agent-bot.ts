import type { Channel, MessageRef, SendOptions } from "@/gateway/channels";
import { RELAY_CONSTANTS } from "@/gateway/consts";
import type { ClaudeExecutor, RunOutcome } from "@/gateway/services/claude-executor";
import { acceptAttachments, buildPromptWithFiles } from "@/gateway/services/file-acceptor";
import { sendWrittenFiles } from "@/gateway/services/file-sender";
import type { SessionStore } from "@/gateway/session";
import { KeyedSerializer } from "@/packages/async";
import { userFacingMessage } from "@/packages/errors";
import { logger } from "@/packages/logger";
import { clip, splitTextChunks } from "@/packages/text";
import type { Bot, Message } from "./index";

export interface AgentBotOptions {
	workspaceDir: string;
	downloadsDir: string;
	messageLimit: number;
	typingIntervalMs?: number;
}

/**
 * Relays free text and attachments to the CLI. One run per chat at a time:
 * a message that arrives mid-run waits for the previous one to finish.
 */
export class AgentBot implements Bot {
	name = "AgentBot";
	private serializer = new KeyedSerializer();

	constructor(
		private channel: Channel,
		private session: SessionStore,
		private executor: ClaudeExecutor,
		private options: AgentBotOptions,
	) {}

	getMenus() {
		return [];
	}

	async handle(message: Message): Promise<boolean> {
		if (this.serializer.isBusy(message.chatId)) {
			logger.info({ chatId: message.chatId }, "Run in progress, message queued");
		}
		await this.serializer.run(message.chatId, () => this.process(message));
		return true;
	}

	private async process(message: Message): Promise<void> {
		const accepted = await acceptAttachments(message, this.channel, this.options.downloadsDir);
		const files = accepted.flatMap((att) => (att.download ? [att.download.path] : []));
		if ((message.attachments?.length ?? 0) > 0 && files.length === 0 && !message.text.trim()) {
			await this.channel.sendMessage(message.chatId, "Couldn't download the attachment.", {
				replyTo: message.messageId,
			});
			return;
		}

		const prompt = buildPromptWithFiles(message.text, files);
		if (!prompt) return;
		logger.info({ chatId: message.chatId, files: files.length }, `Prompt: ${clip(prompt, 80)}`);

		const status = await this.channel.sendMessage(message.chatId, RELAY_CONSTANTS.STATUS_INITIAL_TEXT, {
			replyTo: message.messageId,
		});
		const stopTyping = this.startTyping(message.chatId);

		const generation = this.session.getGeneration();
		let outcome: RunOutcome;
		try {
			outcome = await this.executor.execute({
				prompt,
				resumeSessionId: this.session.getResumeId(),
				onStatus: (text) => this.channel.editMessage(status, text),
			});
		} catch (err) {
			logger.error({ err, chatId: message.chatId }, "Claude run crashed");
			outcome = { kind: "failed", text: userFacingMessage(err), writtenFiles: [], toolCount: 0 };
		} finally {
			stopTyping();
		}

		this.session.recordExchange(outcome.sessionId, generation);
		logger.info(
			{
				chatId: message.chatId,
				kind: outcome.kind,
				tools: outcome.toolCount,
				chars: outcome.text.length,
				session: this.session.describe(),
			},
			"Claude run finished",
		);

		await this.deleteStatus(status);
		await this.reply(message, outcome);
		await sendWrittenFiles(this.channel, message.chatId, outcome.writtenFiles, this.options.workspaceDir);
	}

	private async reply(message: Message, outcome: RunOutcome): Promise<void> {
		// Error texts carry raw stderr and go out as plain text
		const options: SendOptions = { replyTo: message.messageId };
		if (outcome.kind === "result") options.parseMode = "Markdown";
		for (const chunk of splitTextChunks(outcome.text, this.options.messageLimit)) {
			await this.channel.sendMessage(message.chatId, chunk, options);
		}
	}

	private async deleteStatus(status: MessageRef): Promise<void> {
		try {
			await this.channel.deleteMessage(status);
		} catch (err) {
			logger.debug({ err, chatId: status.chatId }, "Failed to delete status message");
		}
	}

	private startTyping(chatId: string | number): () => void {
		const showTyping = this.channel.showTyping?.bind(this.channel);
		if (!showTyping) return () => {};

		const tick = () => {
			showTyping(chatId).catch((err: unknown) => logger.debug({ err, chatId }, "Typing indicator failed"));
		};
		tick();
		const timer = setInterval(tick, this.options.typingIntervalMs ?? RELAY_CONSTANTS.TELEGRAM.TYPING_INTERVAL_MS);
		return () => clearInterval(timer);
	}
}
