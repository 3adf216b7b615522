import type { ChatId } from './types.js';

/**
 * Runs tasks for the same chat one after another. Tasks for different chats
 * never wait on each other.
 */
export class ChatLock {
	// Last queued task per chat; settles without rejecting
	private readonly tails = new Map<string, Promise<void>>();

	async run<T>(chatId: ChatId, task: () => Promise<T>): Promise<T> {
		const key = String(chatId);
		const previous = this.tails.get(key) ?? Promise.resolve();

		const result = previous.then(() => task());
		const tail = result.then(
			() => undefined,
			() => undefined
		);
		this.tails.set(key, tail);

		try {
			return await result;
		} finally {
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		}
	}

	/** Number of chats with a queued or running task */
	get size(): number {
		return this.tails.size;
	}
}
