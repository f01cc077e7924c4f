import { RELAY_CONSTANTS } from "@/gateway/consts";
import type { ToolInvocation } from "@/gateway/schemas/stream-event";
import { logger } from "@/packages/logger";
import { keepTail } from "@/packages/text";

export interface StatusPresenterOptions {
	/** Minimum gap between two edits of the status message */
	minIntervalMs: number;
	/** Maximum length of the rendered status text */
	maxChars: number;
	edit: (text: string) => Promise<void>;
	now?: () => number;
}

/**
 * Renders tool activity into the single "Working..." message of a request.
 *
 * Telegram rate-limits message edits, so updates arriving faster than
 * `minIntervalMs` are coalesced: the log keeps growing, and the next allowed
 * edit shows all of it.
 */
export class StatusPresenter {
	private readonly toolLog: string[] = [];
	private lastEditAt: number | null = null;
	private pending = false;
	private editCount = 0;
	private readonly now: () => number;

	constructor(private readonly options: StatusPresenterOptions) {
		this.now = options.now ?? Date.now;
	}

	/**
	 * Records new tool activity and edits the status if the interval allows.
	 */
	async record(tools: ToolInvocation[]): Promise<void> {
		for (const tool of tools) {
			this.toolLog.push(tool.summary);
			logger.info({ tool: tool.name }, `Tool: ${tool.summary}`);
		}
		if (tools.length > 0) this.pending = true;
		await this.tick();
	}

	/**
	 * Applies a coalesced update once the interval has elapsed. Safe to call often.
	 */
	async tick(): Promise<void> {
		if (!this.pending || !this.canEdit()) return;

		this.pending = false;
		this.lastEditAt = this.now();
		this.editCount += 1;
		try {
			await this.options.edit(this.render());
		} catch (err) {
			logger.debug({ err }, "Failed to edit status message");
		}
	}

	render(): string {
		const text = this.toolLog.length > 0 ? this.toolLog.join("\n") : RELAY_CONSTANTS.STATUS_INITIAL_TEXT;
		return keepTail(text, this.options.maxChars);
	}

	get hasPending(): boolean {
		return this.pending;
	}

	get toolCount(): number {
		return this.toolLog.length;
	}

	get edits(): number {
		return this.editCount;
	}

	private canEdit(): boolean {
		return this.lastEditAt === null || this.now() - this.lastEditAt >= this.options.minIntervalMs;
	}
}
