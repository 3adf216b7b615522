export const TELEGRAM_MESSAGE_LIMIT = 4096;

/**
 * Splits text into consecutive pieces of at most `maxSize` UTF-16 code units.
 * Cuts are purely positional: words, escapes and surrogate pairs may be split.
 * Joining the result gives back `text`; an empty text gives no chunks.
 */
export function chunkText(text: string, maxSize: number = TELEGRAM_MESSAGE_LIMIT): string[] {
	if (!Number.isInteger(maxSize) || maxSize <= 0) {
		throw new RangeError(`Chunk size must be a positive integer, got ${maxSize}`);
	}

	const chunks: string[] = [];
	for (let offset = 0; offset < text.length; offset += maxSize) {
		chunks.push(text.slice(offset, offset + maxSize));
	}
	return chunks;
}
