/**
 * Splits text into chunks of at most `maxChars`, preferring line boundaries.
 * Lines longer than the limit are hard-split.
 */
export function splitTextChunks(text: string, maxChars: number): string[] {
	const normalized = text.trim();
	if (!normalized) return [];
	if (maxChars <= 0 || normalized.length <= maxChars) return [normalized];

	const chunks: string[] = [];
	let current = "";

	const flush = () => {
		if (current) chunks.push(current);
		current = "";
	};

	for (const line of normalized.split("\n")) {
		let remaining = line;
		while (remaining.length > maxChars) {
			flush();
			chunks.push(remaining.slice(0, maxChars));
			remaining = remaining.slice(maxChars);
		}

		const candidate = current ? `${current}\n${remaining}` : remaining;
		if (candidate.length <= maxChars) {
			current = candidate;
		} else {
			flush();
			current = remaining;
		}
	}

	flush();
	return chunks;
}

/**
 * Keeps the end of a long string, marking the cut with a leading ellipsis.
 * Used for paths, where the file name matters more than the root.
 */
export function shortenTail(value: string, maxLength = 40): string {
	if (value.length <= maxLength) return value;
	return `...${value.slice(-(maxLength - 3))}`;
}

/**
 * Keeps only the last `maxChars` characters.
 */
export function keepTail(value: string, maxChars: number): string {
	return value.length > maxChars ? value.slice(-maxChars) : value;
}

export function clip(value: string, maxChars: number): string {
	return value.length > maxChars ? value.slice(0, maxChars) : value;
}
