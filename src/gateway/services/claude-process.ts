import { spawn } from "node:child_process";
import type { Readable } from "node:stream";
import { RELAY_CONSTANTS } from "@/gateway/consts";
import { SpawnError } from "@/packages/errors";
import { logger } from "@/packages/logger";

export interface LaunchOptions {
	prompt: string;
	/** Session to continue; omitted for a fresh session */
	resumeSessionId?: string | null;
	model: string;
	allowedTools: string[];
	cwd: string;
	claudeBin?: string;
	env?: NodeJS.ProcessEnv;
}

/**
 * A running CLI process. `exited` resolves with the exit code, or null when the
 * process was ended by a signal.
 */
export interface ClaudeProcess {
	pid?: number;
	stdout: Readable;
	stderr: Readable;
	exited: Promise<number | null>;
	kill(): void;
}

export type ClaudeLauncher = (options: LaunchOptions) => Promise<ClaudeProcess>;

export function buildClaudeArgs(options: Pick<LaunchOptions, "prompt" | "resumeSessionId" | "model" | "allowedTools">): string[] {
	const args = [
		"-p",
		options.prompt,
		"--output-format",
		"stream-json",
		"--verbose",
		"--model",
		options.model,
		"--allowedTools",
		options.allowedTools.join(","),
	];
	if (options.resumeSessionId) {
		args.push("--resume", options.resumeSessionId);
	}
	return args;
}

/**
 * Copies the environment without the variable that marks a nested CLI session.
 */
export function buildChildEnv(env: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
	const childEnv: NodeJS.ProcessEnv = {};
	for (const [key, value] of Object.entries(env)) {
		if (key === RELAY_CONSTANTS.CLAUDE.NESTED_SESSION_ENV) continue;
		childEnv[key] = value;
	}
	return childEnv;
}

/**
 * Spawns the assistant CLI in streaming mode. Stdin is ignored so the CLI never
 * waits on an interactive prompt.
 * @throws {SpawnError} when the binary cannot be started
 */
export const launchClaude: ClaudeLauncher = (options) => {
	const command = options.claudeBin ?? RELAY_CONSTANTS.CLAUDE.DEFAULT_BIN;
	const args = buildClaudeArgs(options);

	logger.info(
		{ session: options.resumeSessionId ? options.resumeSessionId.slice(0, 8) : "new", cwd: options.cwd },
		"Spawning claude",
	);

	return new Promise<ClaudeProcess>((resolve, reject) => {
		let child: ReturnType<typeof spawn>;
		try {
			child = spawn(command, args, {
				cwd: options.cwd,
				env: buildChildEnv(options.env),
				stdio: ["ignore", "pipe", "pipe"],
				windowsHide: true,
			});
		} catch (error) {
			reject(new SpawnError(command, error));
			return;
		}

		const { stdout, stderr } = child;
		if (!stdout || !stderr) {
			child.kill("SIGKILL");
			reject(new SpawnError(command, new Error("stdio pipes unavailable")));
			return;
		}

		const exited = new Promise<number | null>((resolveExit) => {
			child.once("close", (code) => resolveExit(code));
		});

		child.on("error", (error) => {
			logger.error({ err: error, command }, "claude process error");
			reject(new SpawnError(command, error));
		});

		child.once("spawn", () => {
			resolve({
				pid: child.pid,
				stdout,
				stderr,
				exited,
				kill: () => {
					if (child.exitCode === null && child.signalCode === null) {
						child.kill("SIGKILL");
					}
				},
			});
		});
	});
};
