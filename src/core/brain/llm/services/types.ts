/**
 * The CompletionService interface is the contract between the conversation
 * orchestrator and a hosted model.
 */

export type ChatMessage = {
	role: 'user' | 'assistant';
	content: string;
};

export interface CompletionRequest {
	/** The latest user text */
	prompt: string;
	/** Full conversation, oldest first, ending with the latest user turn */
	messages: ChatMessage[];
}

/**
 * `ok: false` covers replies that are absent or lack the expected text field.
 */
export type CompletionResult =
	| { ok: true; text: string; requestId?: string }
	| { ok: false; reason: string; status?: number };

export interface CompletionService {
	complete(request: CompletionRequest): Promise<CompletionResult>;
	getConfig(): CompletionServiceConfig;
}

export type CompletionServiceConfig = {
	provider: string;
	appId: string;
};

/**
 * Thrown when the model endpoint cannot be reached at all.
 */
export class LLMServiceError extends Error {
	constructor(
		message: string,
		public override readonly cause?: Error
	) {
		super(message);
		this.name = 'LLMServiceError';
	}
}
