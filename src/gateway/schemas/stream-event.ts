import { z } from "zod";
import { describeTool } from "@/gateway/services/tool-describer";
import { isRecord } from "@/packages/config";

/**
 * One tool call announced by the assistant.
 */
export interface ToolInvocation {
	name: string;
	input: Record<string, unknown>;
	/** One-line description for the status message */
	summary: string;
}

export type StreamEvent =
	| { type: "tool_use"; tools: ToolInvocation[]; sessionId?: string }
	| { type: "result"; text: string; isError: boolean; sessionId?: string }
	| { type: "other"; eventType: string; sessionId?: string };

const ResultEventSchema = z.object({
	type: z.literal("result"),
	result: z.string().optional().catch(undefined),
	is_error: z.boolean().optional().catch(undefined),
	session_id: z.string().optional().catch(undefined),
});

const ToolUseBlockSchema = z.object({
	type: z.literal("tool_use"),
	name: z.string().catch("?"),
	input: z.unknown(),
});

function readSessionId(event: Record<string, unknown>): string | undefined {
	const sid = event.session_id;
	return typeof sid === "string" && sid.length > 0 ? sid : undefined;
}

function extractToolInvocations(event: Record<string, unknown>): ToolInvocation[] {
	// Assistant events nest content under `message`; bare content blocks are accepted too
	const message = isRecord(event.message) ? event.message : event;
	if (!Array.isArray(message.content)) return [];

	const tools: ToolInvocation[] = [];
	for (const block of message.content) {
		const parsed = ToolUseBlockSchema.safeParse(block);
		if (!parsed.success) continue;
		const input = isRecord(parsed.data.input) ? parsed.data.input : {};
		tools.push({
			name: parsed.data.name,
			input,
			summary: describeTool(parsed.data.name, input),
		});
	}
	return tools;
}

/**
 * Decodes one line of the CLI's stream-json output.
 * Returns null for blank lines, invalid JSON and non-object values.
 */
export function decodeStreamLine(line: string): StreamEvent | null {
	const trimmed = line.trim();
	if (!trimmed) return null;

	let raw: unknown;
	try {
		raw = JSON.parse(trimmed);
	} catch {
		return null;
	}
	if (!isRecord(raw)) return null;

	const result = ResultEventSchema.safeParse(raw);
	if (result.success) {
		return {
			type: "result",
			text: result.data.result ?? "",
			isError: result.data.is_error ?? false,
			sessionId: result.data.session_id || undefined,
		};
	}

	const sessionId = readSessionId(raw);
	const tools = extractToolInvocations(raw);
	if (tools.length > 0) {
		return { type: "tool_use", tools, sessionId };
	}

	return {
		type: "other",
		eventType: typeof raw.type === "string" ? raw.type : "unknown",
		sessionId,
	};
}
