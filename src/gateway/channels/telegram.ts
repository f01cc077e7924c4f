import fs from "node:fs/promises";
import { z } from "zod";
import type { Channel, ChannelAdapter, MessageRef, OutboundFile, SendOptions } from "@/gateway/channels";
import { RELAY_CONSTANTS } from "@/gateway/consts";
import type { Attachment, Message } from "@/gateway/pipeline";
import { type TelegramPhotoSize, TelegramUpdateSchema } from "@/gateway/schemas/telegram-update";
import { TelegramApiError } from "@/packages/errors";
import { logger } from "@/packages/logger";

const REDACTED_TOKEN = "<redacted>";

// Available chat actions for sendChatAction
type ChatAction = "typing" | "upload_photo" | "upload_document";

const ApiResponseSchema = z.object({
	ok: z.boolean(),
	result: z.unknown().optional(),
	description: z.string().optional(),
	error_code: z.number().optional(),
});

const SentMessageSchema = z.object({
	message_id: z.number(),
	chat: z.object({ id: z.number() }),
});

const FileSchema = z.object({
	file_id: z.string(),
	file_path: z.string().optional(),
	file_size: z.number().optional(),
});

function redactToken(input: string, token: string): string {
	if (!token || !input.includes(token)) return input;
	return input.split(token).join(REDACTED_TOKEN);
}

function sanitizeTelegramNetworkError(error: unknown, token: string): Error {
	if (error instanceof Error) {
		const sanitized = new Error(redactToken(error.message, token));
		sanitized.name = error.name;
		return sanitized;
	}
	return new Error("Unknown network error");
}

type ApiPayload = { json: Record<string, unknown> } | { form: FormData };

interface CallOptions {
	timeoutMs?: number;
	signal?: AbortSignal;
}

export class TelegramClient {
	constructor(
		private botToken: string,
		private apiBase: string = RELAY_CONSTANTS.TELEGRAM.API_BASE,
	) {}

	/**
	 * Calls a Bot API method and returns its `result`.
	 * @throws {TelegramApiError} when Telegram answers ok=false or a non-2xx status
	 */
	async call(method: string, payload?: ApiPayload, options: CallOptions = {}): Promise<unknown> {
		const url = `${this.apiBase}/bot${this.botToken}/${method}`;
		const timeoutMs = options.timeoutMs ?? RELAY_CONSTANTS.TELEGRAM.API_TIMEOUT_MS;

		// The caller's signal (poller shutdown) cuts the request short as well as the timeout
		const controller = new AbortController();
		const timer = setTimeout(() => controller.abort(), timeoutMs);
		const onAbort = () => controller.abort();
		options.signal?.addEventListener("abort", onAbort, { once: true });

		const init: RequestInit = { method: "POST", signal: controller.signal };
		if (payload && "json" in payload) {
			init.headers = { "Content-Type": "application/json" };
			init.body = JSON.stringify(payload.json);
		} else if (payload) {
			init.body = payload.form;
		}

		let raw: string;
		let status: number;
		try {
			const response = await fetch(url, init);
			status = response.status;
			raw = await response.text();
		} catch (error) {
			throw sanitizeTelegramNetworkError(error, this.botToken);
		} finally {
			clearTimeout(timer);
			options.signal?.removeEventListener("abort", onAbort);
		}

		let body: unknown;
		try {
			body = JSON.parse(raw);
		} catch {
			throw new TelegramApiError(method, redactToken(raw || `HTTP ${status}`, this.botToken), status);
		}

		const parsed = ApiResponseSchema.safeParse(body);
		if (!parsed.success || !parsed.data.ok) {
			const description = parsed.success ? (parsed.data.description ?? "request failed") : "malformed response";
			throw new TelegramApiError(method, redactToken(description, this.botToken), status);
		}
		return parsed.data.result;
	}

	async sendMessage(
		chatId: string | number,
		text: string,
		options: { parse_mode?: string; reply_to_message_id?: number } = {},
	): Promise<{ message_id: number; chat: { id: number } }> {
		const result = await this.call("sendMessage", { json: { chat_id: chatId, text, ...options } });
		return SentMessageSchema.parse(result);
	}

	async editMessageText(chatId: string | number, messageId: number, text: string): Promise<void> {
		await this.call("editMessageText", { json: { chat_id: chatId, message_id: messageId, text } });
	}

	async deleteMessage(chatId: string | number, messageId: number): Promise<void> {
		await this.call("deleteMessage", { json: { chat_id: chatId, message_id: messageId } });
	}

	async sendChatAction(chatId: string | number, action: ChatAction = "typing"): Promise<void> {
		try {
			await this.call("sendChatAction", { json: { chat_id: chatId, action } });
		} catch (error) {
			// chat actions are cosmetic
			logger.warn({ chatId, action, err: error }, "Failed to send chat action");
		}
	}

	async setCommands(commands: { command: string; description: string }[]): Promise<void> {
		logger.debug({ count: commands.length, commands }, "Updating Telegram bot menu commands");
		await this.call("setMyCommands", { json: { commands } });
	}

	async getUpdates(offset: number | undefined, timeoutSeconds: number, signal?: AbortSignal): Promise<unknown[]> {
		const json: Record<string, unknown> = { timeout: timeoutSeconds, allowed_updates: ["message"] };
		if (offset !== undefined) json.offset = offset;
		const result = await this.call(
			"getUpdates",
			{ json },
			{ timeoutMs: timeoutSeconds * 1000 + RELAY_CONSTANTS.TELEGRAM.API_TIMEOUT_MS, signal },
		);
		return Array.isArray(result) ? result : [];
	}

	async deleteWebhook(dropPendingUpdates: boolean): Promise<void> {
		await this.call("deleteWebhook", { json: { drop_pending_updates: dropPendingUpdates } });
	}

	async setWebhook(url: string, secretToken?: string): Promise<void> {
		const json: Record<string, unknown> = { url, allowed_updates: ["message"], drop_pending_updates: true };
		if (secretToken) json.secret_token = secretToken;
		await this.call("setWebhook", { json });
	}

	async getFile(fileId: string): Promise<{ file_path: string; file_size?: number }> {
		const result = FileSchema.parse(await this.call("getFile", { json: { file_id: fileId } }));
		if (!result.file_path) {
			throw new TelegramApiError("getFile", "missing file_path");
		}
		return { file_path: result.file_path, file_size: result.file_size };
	}

	async downloadFile(filePath: string): Promise<Response> {
		const url = `${this.apiBase}/file/bot${this.botToken}/${filePath}`;
		try {
			return await fetch(url, { signal: AbortSignal.timeout(RELAY_CONSTANTS.TELEGRAM.API_TIMEOUT_MS) });
		} catch (error) {
			throw sanitizeTelegramNetworkError(error, this.botToken);
		}
	}

	async sendFile(chatId: string | number, file: OutboundFile): Promise<void> {
		const data = await fs.readFile(file.path);
		const form = new FormData();
		form.append("chat_id", String(chatId));
		if (file.kind === "photo") {
			form.append("photo", new Blob([data]), file.name);
			form.append("caption", file.name);
			await this.call("sendPhoto", { form });
		} else {
			form.append("document", new Blob([data]), file.name);
			await this.call("sendDocument", { form });
		}
	}
}

function pickLargestPhoto(photos: TelegramPhotoSize[]): TelegramPhotoSize | undefined {
	// Telegram lists sizes smallest first; file_size breaks ties when present
	let largest: TelegramPhotoSize | undefined;
	for (const photo of photos) {
		if (!largest || (photo.file_size ?? 0) >= (largest.file_size ?? 0)) {
			largest = photo;
		}
	}
	return largest;
}

export class TelegramChannel implements Channel, ChannelAdapter {
	name = "telegram";
	private client: TelegramClient;

	constructor(botToken: string, client?: TelegramClient) {
		this.client = client ?? new TelegramClient(botToken);
	}

	getClient(): TelegramClient {
		return this.client;
	}

	async sendMessage(chatId: string | number, text: string, options: SendOptions = {}): Promise<MessageRef> {
		const base = options.replyTo !== undefined ? { reply_to_message_id: options.replyTo } : {};
		let sent: { message_id: number };
		if (options.parseMode) {
			try {
				sent = await this.client.sendMessage(chatId, text, { ...base, parse_mode: options.parseMode });
			} catch (error) {
				if (!(error instanceof TelegramApiError)) throw error;
				logger.debug({ chatId, err: error }, "Markup rejected, resending as plain text");
				sent = await this.client.sendMessage(chatId, text, base);
			}
		} else {
			sent = await this.client.sendMessage(chatId, text, base);
		}

		const maxLength = 256;
		const truncatedText = text.length > maxLength ? `${text.substring(0, maxLength)}...` : text;
		logger.info(`[${chatId}] <== ${truncatedText.replace(/\n/g, "\\n")}`);
		return { chatId, messageId: sent.message_id };
	}

	async editMessage(ref: MessageRef, text: string): Promise<void> {
		await this.client.editMessageText(ref.chatId, ref.messageId, text);
	}

	async deleteMessage(ref: MessageRef): Promise<void> {
		await this.client.deleteMessage(ref.chatId, ref.messageId);
	}

	async showTyping(chatId: string | number): Promise<void> {
		await this.client.sendChatAction(chatId, "typing");
	}

	async setMenu(commands: { command: string; description: string }[]): Promise<void> {
		await this.client.setCommands(commands);
	}

	async sendFile(chatId: string | number, file: OutboundFile): Promise<void> {
		await this.client.sendChatAction(chatId, file.kind === "photo" ? "upload_photo" : "upload_document");
		await this.client.sendFile(chatId, file);
		logger.info({ chatId, file: file.name }, "Sent file to Telegram");
	}

	async fetchAttachment(fileId: string, maxBytes: number): Promise<{ data: Uint8Array; remotePath: string }> {
		const meta = await this.client.getFile(fileId);
		if (meta.file_size !== undefined && meta.file_size > maxBytes) {
			throw new Error(`File exceeds max size (${meta.file_size} > ${maxBytes})`);
		}

		const response = await this.client.downloadFile(meta.file_path);
		if (!response.ok) {
			throw new TelegramApiError("downloadFile", `HTTP ${response.status}`, response.status);
		}

		const data = new Uint8Array(await response.arrayBuffer());
		if (data.length > maxBytes) {
			throw new Error(`File exceeds max size (${data.length} > ${maxBytes})`);
		}
		return { data, remotePath: meta.file_path };
	}

	parseUpdate(body: unknown): Message | null {
		const parsed = TelegramUpdateSchema.safeParse(body);
		if (!parsed.success) return null;

		const update = parsed.data;
		const msg = update.message;
		if (!msg) return null;
		const attachments: Attachment[] = [];

		const photo = msg.photo ? pickLargestPhoto(msg.photo) : undefined;
		if (photo) {
			attachments.push({
				source: "telegram",
				fileId: photo.file_id,
				uniqueId: photo.file_unique_id,
				mimeType: "image/jpeg",
				sizeBytes: photo.file_size,
				kind: "photo",
			});
		}

		if (msg.document) {
			attachments.push({
				source: "telegram",
				fileId: msg.document.file_id,
				uniqueId: msg.document.file_unique_id,
				fileName: msg.document.file_name,
				mimeType: msg.document.mime_type,
				sizeBytes: msg.document.file_size,
				kind: "document",
			});
		}

		return {
			channelId: "telegram",
			chatId: msg.chat.id,
			messageId: msg.message_id,
			text: msg.text ?? msg.caption ?? "",
			sender: msg.from?.username || msg.from?.first_name || "unknown",
			updateId: update.update_id,
			user: msg.from ? { id: msg.from.id, username: msg.from.username } : undefined,
			attachments,
		};
	}
}
