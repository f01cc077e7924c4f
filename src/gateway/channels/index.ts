import type { Message } from "@/gateway/pipeline";

export interface MessageRef {
	chatId: string | number;
	messageId: number;
}

export interface SendOptions {
	/** Telegram parse mode; rejected markup is resent as plain text */
	parseMode?: "Markdown" | "MarkdownV2" | "HTML";
	replyTo?: number;
}

export interface OutboundFile {
	path: string;
	name: string;
	kind: "photo" | "document";
}

export interface Channel {
	name: string;
	/**
	 * Sends a message back to the user on this channel.
	 */
	sendMessage(chatId: string | number, text: string, options?: SendOptions): Promise<MessageRef>;

	editMessage(ref: MessageRef, text: string): Promise<void>;

	deleteMessage(ref: MessageRef): Promise<void>;

	/**
	 * Shows a typing/working indicator to the user.
	 * Optional - channels that don't support this will no-op.
	 */
	showTyping?(chatId: string | number): Promise<void>;

	sendFile?(chatId: string | number, file: OutboundFile): Promise<void>;

	/**
	 * Fetches the bytes of an inbound attachment, refusing files over `maxBytes`.
	 */
	fetchAttachment?(fileId: string, maxBytes: number): Promise<{ data: Uint8Array; remotePath: string }>;
}

export interface ChannelAdapter {
	/**
	 * Parses a raw update into a generic Message.
	 */
	parseUpdate(body: unknown): Message | null;
}
