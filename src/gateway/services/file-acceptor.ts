import fs from "node:fs/promises";
import path from "node:path";
import type { Channel } from "@/gateway/channels";
import { RELAY_CONSTANTS } from "@/gateway/consts";
import type { Attachment, Message } from "@/gateway/pipeline";
import { logger } from "@/packages/logger";

const safeName = (name: string): string => name.replace(/[^a-zA-Z0-9._-]/g, "_").slice(0, 120);

/**
 * Local file name for a downloaded attachment. Documents keep their name behind a
 * seconds timestamp; photos are named after their unique id.
 */
export function localNameFor(att: Attachment, remotePath: string, nowMs: number = Date.now()): string {
	if (att.kind === "photo") {
		const ext = path.extname(remotePath) || ".jpg";
		return `${safeName(att.uniqueId)}${ext}`;
	}
	const fileName = safeName(att.fileName || path.basename(remotePath) || `file_${att.uniqueId}`);
	return `${Math.floor(nowMs / 1000)}_${fileName}`;
}

/**
 * Downloads the message's attachments into `downloadsDir` and returns the accepted
 * attachments with their local path filled in. Failed downloads are logged and skipped.
 */
export async function acceptAttachments(
	message: Message,
	channel: Channel,
	downloadsDir: string,
	maxBytes: number = RELAY_CONSTANTS.TELEGRAM.MAX_DOWNLOAD_BYTES,
): Promise<Attachment[]> {
	if (!message.attachments || message.attachments.length === 0) return [];
	if (!channel.fetchAttachment) {
		logger.warn({ channel: channel.name }, "Channel cannot download attachments");
		return [];
	}

	await fs.mkdir(downloadsDir, { recursive: true });
	const accepted: Attachment[] = [];

	for (const att of message.attachments) {
		try {
			const { data, remotePath } = await channel.fetchAttachment(att.fileId, maxBytes);
			const dest = path.join(downloadsDir, localNameFor(att, remotePath));
			await fs.writeFile(dest, data);
			accepted.push({ ...att, download: { path: dest, sizeBytes: data.length } });
			logger.info({ chatId: message.chatId, kind: att.kind, dest, sizeBytes: data.length }, "Attachment saved");
		} catch (err) {
			logger.warn(
				{ err: err instanceof Error ? err.message : String(err), fileId: att.fileId, kind: att.kind },
				"Attachment rejected",
			);
		}
	}

	return accepted;
}

/**
 * Prefixes the user's text with Read instructions for every downloaded file.
 */
export function buildPromptWithFiles(text: string, files: string[]): string {
	const trimmed = text.trim();
	if (files.length === 0) return trimmed;

	const refs = files.map((file) => `- ${file}`).join("\n");
	const ask = trimmed || "Take a look at the attached file(s).";
	return `I'm sending you file(s). Use the Read tool to read each one:\n${refs}\n\n${ask}`;
}

/**
 * Empties the downloads directory, leaving it in place.
 */
export async function clearDownloads(downloadsDir: string): Promise<void> {
	await fs.rm(downloadsDir, { recursive: true, force: true });
	await fs.mkdir(downloadsDir, { recursive: true });
}
