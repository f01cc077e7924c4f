import fs from "node:fs/promises";
import path from "node:path";
import type { Channel, OutboundFile } from "@/gateway/channels";
import { RELAY_CONSTANTS } from "@/gateway/consts";
import { logger } from "@/packages/logger";

export interface SendFilesResult {
	sent: string[];
	skipped: string[];
	tooLarge: string[];
}

const isImage = (filePath: string): boolean =>
	RELAY_CONSTANTS.IMAGE_EXTENSIONS.includes(path.extname(filePath).toLowerCase());

/**
 * Sends files the CLI wrote during a run back to the chat: images as photos,
 * everything else as documents. Relative paths resolve against the workspace.
 */
export async function sendWrittenFiles(
	channel: Channel,
	chatId: string | number,
	files: string[],
	workspaceDir: string,
): Promise<SendFilesResult> {
	const result: SendFilesResult = { sent: [], skipped: [], tooLarge: [] };
	if (files.length === 0) return result;
	if (!channel.sendFile) {
		logger.warn({ channel: channel.name, count: files.length }, "Channel cannot send files");
		return result;
	}

	const seen = new Set<string>();
	for (const raw of files) {
		const fullPath = path.resolve(workspaceDir, raw);
		if (seen.has(fullPath)) continue;
		seen.add(fullPath);

		let size: number;
		try {
			const stat = await fs.stat(fullPath);
			if (!stat.isFile()) {
				result.skipped.push(fullPath);
				continue;
			}
			size = stat.size;
		} catch {
			logger.debug({ path: fullPath }, "Written file no longer exists");
			result.skipped.push(fullPath);
			continue;
		}
		if (size === 0) {
			result.skipped.push(fullPath);
			continue;
		}

		const name = path.basename(fullPath);
		const kind: OutboundFile["kind"] = isImage(fullPath) ? "photo" : "document";
		const limit =
			kind === "photo" ? RELAY_CONSTANTS.TELEGRAM.MAX_PHOTO_BYTES : RELAY_CONSTANTS.TELEGRAM.MAX_DOCUMENT_BYTES;

		try {
			if (size > limit) {
				const label = kind === "photo" ? "Image" : "File";
				await channel.sendMessage(chatId, `${label} too large for Telegram (>${limit / 1024 / 1024}MB): ${name}`);
				result.tooLarge.push(fullPath);
				continue;
			}
			await channel.sendFile(chatId, { path: fullPath, name, kind });
			result.sent.push(fullPath);
		} catch (err) {
			logger.error({ err, path: fullPath }, "Failed to send file");
			result.skipped.push(fullPath);
		}
	}

	return result;
}
