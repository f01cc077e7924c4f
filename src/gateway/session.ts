import { logger } from "@/packages/logger";

export type SessionState = "idle" | "active";

export interface SessionSnapshot {
	state: SessionState;
	sessionId: string | null;
	messageCount: number;
	model: string;
}

/**
 * The one conversation the relay keeps with the CLI. Lives in memory only:
 * a restart or /clear starts a fresh CLI session.
 */
export class SessionStore {
	private sessionId: string | null = null;
	private messageCount = 0;
	private generation = 0;

	constructor(private readonly model: string) {}

	/** Session id to pass as --resume, or null for a fresh session. */
	getResumeId(): string | null {
		return this.sessionId;
	}

	/** Bumped by every clear(); a run started under an older generation is stale. */
	getGeneration(): number {
		return this.generation;
	}

	/**
	 * Records the outcome of one exchange. A missing id keeps the current one.
	 * An exchange that started before the last clear() is dropped.
	 */
	recordExchange(sessionId: string | null | undefined, generation = this.generation): void {
		if (generation !== this.generation) {
			logger.info("Session cleared during the run, exchange not recorded");
			return;
		}
		if (sessionId && sessionId !== this.sessionId) {
			logger.info({ session: sessionId.slice(0, 8) }, "Session recorded");
			this.sessionId = sessionId;
		}
		this.messageCount += 1;
	}

	clear(): void {
		this.sessionId = null;
		this.messageCount = 0;
		this.generation += 1;
	}

	snapshot(): SessionSnapshot {
		return {
			state: this.sessionId ? "active" : "idle",
			sessionId: this.sessionId,
			messageCount: this.messageCount,
			model: this.model,
		};
	}

	/** Short form for status lines and logs. */
	describe(): string {
		return this.sessionId ? `${this.sessionId.slice(0, 8)}...` : "none";
	}
}
