import { describe, expect, test } from "vitest";
import { describeTool } from "@/gateway/services/tool-describer";

describe("describeTool", () => {
	test("describes file tools by path", () => {
		expect(describeTool("Read", { file_path: "README.md" })).toBe("Reading README.md");
		expect(describeTool("Write", { file_path: "out/notes.txt" })).toBe("Writing out/notes.txt");
		expect(describeTool("Edit", { file_path: "src/app.ts" })).toBe("Editing src/app.ts");
	});

	test("shortens long paths from the left", () => {
		const longPath = "/home/user/projects/relay/src/gateway/services/x.ts";
		expect(describeTool("Read", { file_path: longPath })).toBe(`Reading ...${longPath.slice(-37)}`);
	});

	test("describes search tools by pattern or query", () => {
		expect(describeTool("Glob", { pattern: "**/*.ts" })).toBe("Searching for **/*.ts");
		expect(describeTool("Grep", { pattern: "TODO" })).toBe('Searching code for "TODO"');
		expect(describeTool("WebSearch", { query: "node streams" })).toBe('Searching web for "node streams"');
	});

	test("uses fallbacks for missing fields", () => {
		expect(describeTool("Read", {})).toBe("Reading ?");
		expect(describeTool("Glob", {})).toBe("Searching for files");
		expect(describeTool("Grep", { pattern: 3 })).toBe('Searching code for "..."');
	});

	test("fixed descriptions for Bash and Task", () => {
		expect(describeTool("Bash", { command: "rm -rf /tmp/x" })).toBe("Running command");
		expect(describeTool("Task", { prompt: "x" })).toBe("Running subtask");
	});

	test("unknown tools fall back to their name", () => {
		expect(describeTool("NotebookEdit", {})).toBe("Using NotebookEdit");
		expect(describeTool("toString", {})).toBe("Using toString");
	});
});
