import type { TelegramChannel } from "@/gateway/channels/telegram";
import type { Message } from "@/gateway/pipeline";
import { delay } from "@/packages/async";
import { logger } from "@/packages/logger";

const RETRY_DELAY_MS = 5000;

export interface PollerOptions {
	timeoutSeconds: number;
	/** Called for every parsed message; must not throw */
	onMessage: (message: Message) => void;
	retryDelayMs?: number;
}

/**
 * Long-polls getUpdates and hands each message to `onMessage` without waiting for it,
 * so commands stay responsive while a CLI run is in flight.
 */
export class TelegramPoller {
	private offset: number | undefined;
	private controller: AbortController | null = null;
	private loop: Promise<void> | null = null;

	constructor(
		private readonly channel: TelegramChannel,
		private readonly options: PollerOptions,
	) {}

	/**
	 * Drops updates queued while the relay was down, then starts polling.
	 */
	async start(): Promise<void> {
		if (this.loop) return;
		await this.channel.getClient().deleteWebhook(true);
		const controller = new AbortController();
		this.controller = controller;
		this.loop = this.run(controller.signal);
		logger.info({ timeoutSeconds: this.options.timeoutSeconds }, "Telegram long polling started");
	}

	async stop(): Promise<void> {
		this.controller?.abort();
		await this.loop;
		this.loop = null;
		this.controller = null;
	}

	/**
	 * Fetches one batch and dispatches it. Returns the number of updates seen.
	 */
	async pollOnce(signal?: AbortSignal): Promise<number> {
		const updates = await this.channel
			.getClient()
			.getUpdates(this.offset, this.options.timeoutSeconds, signal);

		for (const update of updates) {
			const updateId = readUpdateId(update);
			if (updateId !== undefined) this.offset = updateId + 1;

			const message = this.channel.parseUpdate(update);
			if (!message) {
				logger.debug({ updateId }, "Ignored update: no message or unsupported update type");
				continue;
			}
			this.options.onMessage(message);
		}
		return updates.length;
	}

	get nextOffset(): number | undefined {
		return this.offset;
	}

	private async run(signal: AbortSignal): Promise<void> {
		while (!signal.aborted) {
			try {
				await this.pollOnce(signal);
			} catch (err) {
				if (signal.aborted) break;
				logger.error({ err }, "getUpdates failed, retrying");
				await delay(this.options.retryDelayMs ?? RETRY_DELAY_MS);
			}
		}
		logger.info("Telegram long polling stopped");
	}
}

function readUpdateId(update: unknown): number | undefined {
	if (!update || typeof update !== "object" || !("update_id" in update)) return undefined;
	return typeof update.update_id === "number" ? update.update_id : undefined;
}
