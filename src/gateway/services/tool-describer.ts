import { shortenTail } from "@/packages/text";

type Describer = (input: Record<string, unknown>) => string;

const str = (input: Record<string, unknown>, key: string, fallback: string): string => {
	const value = input[key];
	return typeof value === "string" && value.length > 0 ? value : fallback;
};

const DESCRIBERS: Record<string, Describer> = {
	Read: (i) => `Reading ${shortenTail(str(i, "file_path", "?"))}`,
	Glob: (i) => `Searching for ${str(i, "pattern", "files")}`,
	Grep: (i) => `Searching code for "${str(i, "pattern", "...")}"`,
	Bash: () => "Running command",
	Write: (i) => `Writing ${shortenTail(str(i, "file_path", "?"))}`,
	Edit: (i) => `Editing ${shortenTail(str(i, "file_path", "?"))}`,
	WebSearch: (i) => `Searching web for "${str(i, "query", "...")}"`,
	WebFetch: (i) => `Fetching ${shortenTail(str(i, "url", "?"), 60)}`,
	Task: () => "Running subtask",
};

/**
 * Turns a tool_use block into a one-liner for the status message.
 */
export function describeTool(name: string, input: Record<string, unknown>): string {
	const describer = Object.hasOwn(DESCRIBERS, name) ? DESCRIBERS[name] : undefined;
	return describer ? describer(input) : `Using ${name}`;
}
