import { RELAY_CONSTANTS } from "@/gateway/consts";
import type { StreamEvent } from "@/gateway/schemas/stream-event";
import { type ClaudeLauncher, type ClaudeProcess, launchClaude } from "@/gateway/services/claude-process";
import { StatusPresenter } from "@/gateway/services/status-presenter";
import { pipeStreamEvents } from "@/gateway/services/stream-reader";
import { AsyncQueue } from "@/packages/async";
import { ProcessExitError, ProcessTimeoutError, type RelayError, SpawnError, userFacingMessage } from "@/packages/errors";
import { logger } from "@/packages/logger";

// Configuration for one CLI run
export interface ClaudeExecutionConfig {
	model: string;
	allowedTools: string[];
	workspaceDir: string;
	claudeBin: string;
	timeoutSeconds: number;
	statusThrottleMs: number;
	messageLimit: number;
}

export interface ClaudeExecutionRequest {
	prompt: string;
	resumeSessionId: string | null;
	/** Edits the status message; failures are logged and ignored */
	onStatus: (text: string) => Promise<void>;
}

export type RunOutcomeKind = "result" | "empty" | "timeout" | "failed";

// Result of one CLI run
export interface RunOutcome {
	kind: RunOutcomeKind;
	/** Text to send back to the chat */
	text: string;
	sessionId?: string;
	/** Paths passed to the Write tool, in call order */
	writtenFiles: string[];
	toolCount: number;
	exitCode?: number | null;
	error?: RelayError;
}

export interface ClaudeExecutorDeps {
	launcher?: ClaudeLauncher;
	now?: () => number;
	queuePollMs?: number;
	exitGraceMs?: number;
}

/**
 * Runs the CLI for one message and turns its event stream into a RunOutcome.
 *
 * Events flow launcher → stream reader → queue → this loop. The loop wakes at
 * least once per `queuePollMs` so coalesced status updates still go out while
 * the CLI is quiet. Past the timeout the child is killed and the queue closed.
 */
export class ClaudeExecutor {
	private readonly launcher: ClaudeLauncher;
	private readonly now: () => number;
	private readonly queuePollMs: number;
	private readonly exitGraceMs: number;

	constructor(
		private readonly config: ClaudeExecutionConfig,
		deps: ClaudeExecutorDeps = {},
	) {
		this.launcher = deps.launcher ?? launchClaude;
		this.now = deps.now ?? Date.now;
		this.queuePollMs = deps.queuePollMs ?? RELAY_CONSTANTS.CLAUDE.QUEUE_POLL_MS;
		this.exitGraceMs = deps.exitGraceMs ?? RELAY_CONSTANTS.CLAUDE.EXIT_GRACE_MS;
	}

	async execute(request: ClaudeExecutionRequest): Promise<RunOutcome> {
		let proc: ClaudeProcess;
		try {
			proc = await this.launcher({
				prompt: request.prompt,
				resumeSessionId: request.resumeSessionId,
				model: this.config.model,
				allowedTools: this.config.allowedTools,
				cwd: this.config.workspaceDir,
				claudeBin: this.config.claudeBin,
			});
		} catch (error) {
			const spawnError = error instanceof SpawnError ? error : new SpawnError(this.config.claudeBin, error);
			logger.error({ err: spawnError }, "Claude invocation failed");
			return {
				kind: "failed",
				text: userFacingMessage(spawnError),
				writtenFiles: [],
				toolCount: 0,
				error: spawnError,
			};
		}

		return this.consume(proc, request);
	}

	private async consume(proc: ClaudeProcess, request: ClaudeExecutionRequest): Promise<RunOutcome> {
		const queue = new AsyncQueue<StreamEvent>();
		const presenter = new StatusPresenter({
			minIntervalMs: this.config.statusThrottleMs,
			maxChars: this.config.messageLimit,
			edit: request.onStatus,
			now: this.now,
		});

		let stderr = "";
		proc.stderr.setEncoding("utf8");
		proc.stderr.on("data", (chunk: string) => {
			stderr += chunk;
		});

		const stats = pipeStreamEvents(proc.stdout, queue);

		let timedOut = false;
		const timeoutMs = this.config.timeoutSeconds * 1000;
		const timer = setTimeout(() => {
			timedOut = true;
			logger.warn({ timeoutMs, pid: proc.pid }, "Claude execution timed out, killing process");
			proc.kill();
			queue.close();
		}, timeoutMs);

		let resultText: string | null = null;
		let resultSessionId: string | undefined;
		let lastSessionId: string | undefined;
		const writtenFiles: string[] = [];

		try {
			while (true) {
				const next = await queue.next(this.queuePollMs);
				if (next.kind === "closed") break;
				if (next.kind === "timeout") {
					await presenter.tick();
					continue;
				}

				const event = next.value;
				if (event.sessionId) lastSessionId = event.sessionId;

				switch (event.type) {
					case "result":
						resultText = event.text;
						resultSessionId = event.sessionId;
						if (event.sessionId) {
							logger.info({ session: event.sessionId.slice(0, 8) }, "Session");
						}
						break;
					case "tool_use":
						for (const tool of event.tools) {
							const filePath = tool.input.file_path;
							if (tool.name === "Write" && typeof filePath === "string" && filePath.length > 0) {
								writtenFiles.push(filePath);
							}
						}
						await presenter.record(event.tools);
						break;
					case "other":
						await presenter.tick();
						break;
				}
			}
		} finally {
			clearTimeout(timer);
		}

		const exitCode = await this.waitForExit(proc);
		const stderrText = stderr.trim();
		const sessionId = resultSessionId ?? lastSessionId;

		logger.info(
			{
				exitCode,
				stderrBytes: stderrText.length,
				tools: presenter.toolCount,
				edits: presenter.edits,
				malformed: stats.malformed,
			},
			"claude exited",
		);

		const base = { writtenFiles, toolCount: presenter.toolCount, exitCode, sessionId };

		if (resultText?.trim()) {
			return { ...base, kind: "result", text: resultText };
		}

		if (timedOut) {
			const error = new ProcessTimeoutError(this.config.timeoutSeconds);
			return { ...base, kind: "timeout", text: error.message, error };
		}

		if (exitCode !== 0) {
			logger.error({ exitCode, stderr: stderrText }, "claude error");
			const error = new ProcessExitError(exitCode, stderrText);
			return { ...base, kind: "failed", text: error.message, error };
		}

		if (resultText !== null) {
			return { ...base, kind: "result", text: "(no response)" };
		}

		return { ...base, kind: "empty", text: stderrText || "(no response)" };
	}

	private async waitForExit(proc: ClaudeProcess): Promise<number | null> {
		let timer: NodeJS.Timeout | undefined;
		const grace = new Promise<"grace">((resolve) => {
			timer = setTimeout(() => resolve("grace"), this.exitGraceMs);
		});
		const outcome = await Promise.race([proc.exited, grace]);
		clearTimeout(timer);
		if (outcome === "grace") {
			logger.warn({ pid: proc.pid }, "claude did not exit after closing stdout, killing");
			proc.kill();
			return null;
		}
		return outcome;
	}
}
