import type { Message } from "@/gateway/pipeline";
import { logger } from "@/packages/logger";

/**
 * Only the configured owner may talk to the relay. Anyone else is dropped without a reply.
 */
export function isOwner(message: Message, ownerId: number): boolean {
	return message.user?.id === ownerId;
}

/**
 * Returns true when the message may proceed; logs the sender id of rejected messages.
 */
export function guardAccess(message: Message, ownerId: number): boolean {
	if (isOwner(message, ownerId)) return true;
	logger.warn({ senderId: message.user?.id ?? null, chatId: message.chatId }, "Unauthorized message dropped");
	return false;
}
