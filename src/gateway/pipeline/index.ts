export interface Message {
	channelId: string;
	chatId: string | number;
	/** Id of the inbound chat message, used to thread replies */
	messageId?: number;
	text: string;
	sender?: string;
	updateId?: number;
	user?: {
		id: number;
		username?: string;
	};
	attachments?: Attachment[];
}

export interface Attachment {
	source: "telegram";
	fileId: string;
	/** Original name for documents; photos have none */
	fileName?: string;
	uniqueId: string;
	mimeType?: string;
	sizeBytes?: number;
	kind: "photo" | "document";
	download?: {
		path: string;
		sizeBytes: number;
	};
}

export interface Bot {
	name: string;
	/**
	 * Handles a message. Returns true if the message was handled and should stop bubbling,
	 * false if it should continue to the next bot in the chain.
	 */
	handle(message: Message): Promise<boolean>;
	/**
	 * returns the menu commands for this bot.
	 */
	getMenus(): { command: string; description: string }[];
}
