/**
 * Texts the relay sends to users.
 */
export const REPLIES = {
	GREETING:
		'Hi! I am a bot connected to the Qwen assistant. Send me a message and I will pass it on. Use /clearhistory to start a new conversation.',
	WORKING: 'Typing...',
	NO_RESPONSE: 'Could not get a response from the assistant. Please try again later.',
	FAILURE: 'Something went wrong while processing your request.',
	HISTORY_CLEARED: 'History cleared.',
	HISTORY_CLEAR_FAILED: 'Could not clear the history. Please try again later.',
	HISTORY_NOT_SAVED: 'Note: this exchange could not be saved to the conversation history.',
} as const;

export type ReplyTexts = { [K in keyof typeof REPLIES]: string };
