import readline from "node:readline";
import type { Readable } from "node:stream";
import { decodeStreamLine, type StreamEvent } from "@/gateway/schemas/stream-event";
import type { AsyncQueue } from "@/packages/async";
import { logger } from "@/packages/logger";
import { clip } from "@/packages/text";

export interface StreamReadStats {
	lines: number;
	events: number;
	malformed: number;
}

/**
 * Feeds decoded NDJSON events from the CLI's stdout into `queue`, in arrival order.
 * Lines that do not decode are logged and skipped. The queue is closed when the
 * stream ends or fails, so the consumer always sees `closed` exactly once.
 * The returned stats are live and final once the queue is closed.
 */
export function pipeStreamEvents(
	stdout: Readable,
	queue: AsyncQueue<StreamEvent>,
): StreamReadStats {
	const stats: StreamReadStats = { lines: 0, events: 0, malformed: 0 };
	const rl = readline.createInterface({ input: stdout, crlfDelay: Number.POSITIVE_INFINITY });

	rl.on("line", (line) => {
		if (!line.trim()) return;
		stats.lines += 1;

		const event = decodeStreamLine(line);
		if (!event) {
			stats.malformed += 1;
			logger.warn({ preview: clip(line, 200) }, "Non-JSON line from claude");
			return;
		}

		stats.events += 1;
		queue.push(event);
	});

	stdout.once("error", (error) => {
		logger.error({ err: error }, "Error reading claude stdout");
		rl.close();
	});

	rl.once("close", () => {
		queue.close();
	});

	return stats;
}
