import { z } from 'zod';
import type { ChatMessage } from '../brain/llm/services/types.js';
import type { History, Turn, TurnRole } from './types.js';

const TurnSchema = z.object({
	role: z.enum(['user', 'assistant']),
	content: z.string(),
});

const HistorySchema = z.array(TurnSchema);

/**
 * Thrown when a stored history blob is not a JSON array of turns.
 */
export class HistoryFormatError extends Error {
	constructor(
		message: string,
		public override readonly cause?: Error
	) {
		super(message);
		this.name = 'HistoryFormatError';
	}
}

export function createTurn(role: TurnRole, content: string): Turn {
	return Object.freeze({ role, content });
}

/**
 * Returns a new history ending with the given turn. The input is left untouched.
 */
export function appendTurn(history: History, role: TurnRole, content: string): History {
	return [...history, createTurn(role, content)];
}

/**
 * Projects the history onto the messages sent to the model, in order and in full.
 */
export function toRequestMessages(history: History): ChatMessage[] {
	return history.map(turn => ({ role: turn.role, content: turn.content }));
}

export function serializeHistory(history: History): string {
	return JSON.stringify(history.map(turn => ({ role: turn.role, content: turn.content })));
}

/**
 * @throws {HistoryFormatError} If `raw` is not valid JSON or not an array of turns
 */
export function parseHistory(raw: string): History {
	let data: unknown;
	try {
		data = JSON.parse(raw);
	} catch (error) {
		throw new HistoryFormatError(
			'Stored history is not valid JSON',
			error instanceof Error ? error : undefined
		);
	}

	const parsed = HistorySchema.safeParse(data);
	if (!parsed.success) {
		const first = parsed.error.errors[0];
		const where = first ? `${first.path.join('.') || '<root>'}: ${first.message}` : 'unknown';
		throw new HistoryFormatError(`Stored history has an unexpected shape (${where})`);
	}
	return parsed.data.map(turn => createTurn(turn.role, turn.content));
}
