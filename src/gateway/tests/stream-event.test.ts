import { describe, expect, test } from "vitest";
import { decodeStreamLine } from "@/gateway/schemas/stream-event";

describe("decodeStreamLine", () => {
	test("decodes a result event", () => {
		const event = decodeStreamLine(
			JSON.stringify({ type: "result", subtype: "success", result: "Done.", is_error: false, session_id: "abc-123" }),
		);
		expect(event).toEqual({ type: "result", text: "Done.", isError: false, sessionId: "abc-123" });
	});

	test("a result without text decodes to an empty string", () => {
		expect(decodeStreamLine('{"type":"result"}')).toEqual({
			type: "result",
			text: "",
			isError: false,
			sessionId: undefined,
		});
	});

	test("extracts tool_use blocks from assistant messages", () => {
		const event = decodeStreamLine(
			JSON.stringify({
				type: "assistant",
				session_id: "s1",
				message: {
					content: [
						{ type: "text", text: "Let me look." },
						{ type: "tool_use", name: "Read", input: { file_path: "src/index.ts" } },
						{ type: "tool_use", name: "Bash", input: { command: "ls" } },
					],
				},
			}),
		);
		expect(event).toEqual({
			type: "tool_use",
			sessionId: "s1",
			tools: [
				{ name: "Read", input: { file_path: "src/index.ts" }, summary: "Reading src/index.ts" },
				{ name: "Bash", input: { command: "ls" }, summary: "Running command" },
			],
		});
	});

	test("tool blocks with a non-object input get an empty input", () => {
		const event = decodeStreamLine(
			JSON.stringify({ type: "assistant", message: { content: [{ type: "tool_use", name: "Glob", input: "x" }] } }),
		);
		expect(event).toEqual({
			type: "tool_use",
			sessionId: undefined,
			tools: [{ name: "Glob", input: {}, summary: "Searching for files" }],
		});
	});

	test("other events keep their type and session id", () => {
		expect(decodeStreamLine('{"type":"system","subtype":"init","session_id":"s2"}')).toEqual({
			type: "other",
			eventType: "system",
			sessionId: "s2",
		});
		expect(decodeStreamLine('{"foo":1}')).toEqual({ type: "other", eventType: "unknown", sessionId: undefined });
	});

	test("rejects blank lines, invalid JSON and non-objects", () => {
		expect(decodeStreamLine("   ")).toBeNull();
		expect(decodeStreamLine("not json")).toBeNull();
		expect(decodeStreamLine("[1,2]")).toBeNull();
		expect(decodeStreamLine("42")).toBeNull();
	});
});
