import { describe, it, expect } from 'vitest';
import { chunkText, TELEGRAM_MESSAGE_LIMIT } from '../chunker.js';

describe('chunkText', () => {
	it('returns a short text as one chunk', () => {
		expect(chunkText('hello', 10)).toEqual(['hello']);
	});

	it('splits at fixed positions', () => {
		expect(chunkText('abcdefgh', 3)).toEqual(['abc', 'def', 'gh']);
	});

	it('returns no chunks for an empty text', () => {
		expect(chunkText('', 5)).toEqual([]);
	});

	it('produces exact chunks when the length is a multiple of the size', () => {
		expect(chunkText('abcdef', 3)).toEqual(['abc', 'def']);
	});

	it('uses the Telegram limit by default', () => {
		const text = 'x'.repeat(TELEGRAM_MESSAGE_LIMIT * 2 + 1);
		const chunks = chunkText(text);

		expect(chunks.map(chunk => chunk.length)).toEqual([4096, 4096, 1]);
		expect(chunks.join('')).toBe(text);
	});

	it('splits words without regard to boundaries', () => {
		expect(chunkText('hello world', 4)).toEqual(['hell', 'o wo', 'rld']);
	});

	it('rejects a non-positive or fractional size', () => {
		expect(() => chunkText('abc', 0)).toThrow(RangeError);
		expect(() => chunkText('abc', -1)).toThrow(RangeError);
		expect(() => chunkText('abc', 1.5)).toThrow('Chunk size must be a positive integer, got 1.5');
	});
});
