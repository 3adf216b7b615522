/**
 * DashScope Application Service
 *
 * Calls a DashScope (Alibaba Cloud Model Studio) application, the hosted Qwen
 * agent identified by an app id, with the full conversation of one chat.
 */

import { z } from 'zod';
import { logger as defaultLogger, type Logger } from '../../../logger/index.js';
import { DEFAULT_DASHSCOPE_BASE_URL } from '../../../env.js';
import {
	LLMServiceError,
	type CompletionRequest,
	type CompletionResult,
	type CompletionService,
	type CompletionServiceConfig,
} from './types.js';

export interface DashScopeApplicationConfig {
	appId: string;
	apiKey: string;
	baseUrl?: string;
	timeoutMs?: number;
	maxRetries?: number;
	/** Base delay between attempts; attempt n waits n times this value */
	retryDelayMs?: number;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

const ApplicationResponseSchema = z
	.object({
		output: z
			.object({
				text: z.string().refine(text => text.trim().length > 0, 'output.text is empty'),
				finish_reason: z.string().nullish(),
				session_id: z.string().nullish(),
			})
			.passthrough(),
		request_id: z.string().optional(),
	})
	.passthrough();

interface HttpReply {
	ok: boolean;
	status: number;
	text: string;
}

const isRetryableStatus = (status: number): boolean => status === 429 || status >= 500;

export class DashScopeApplicationService implements CompletionService {
	private readonly appId: string;
	private readonly apiKey: string;
	private readonly baseUrl: string;
	private readonly timeoutMs: number;
	private readonly maxRetries: number;
	private readonly retryDelayMs: number;
	private readonly fetchImpl: FetchLike;
	private readonly logger: Logger;

	constructor(
		config: DashScopeApplicationConfig,
		options: { fetch?: FetchLike; logger?: Logger } = {}
	) {
		if (!config.appId || !config.apiKey) {
			throw new LLMServiceError('DashScope application id and API key are required');
		}
		this.appId = config.appId;
		this.apiKey = config.apiKey;
		this.baseUrl = (config.baseUrl || DEFAULT_DASHSCOPE_BASE_URL).replace(/\/+$/, '');
		this.timeoutMs = config.timeoutMs ?? 60000;
		this.maxRetries = Math.max(1, config.maxRetries ?? 3);
		this.retryDelayMs = config.retryDelayMs ?? 1000;
		this.fetchImpl = options.fetch ?? ((url, init) => globalThis.fetch(url, init));
		this.logger = options.logger ?? defaultLogger;
	}

	getConfig(): CompletionServiceConfig {
		return { provider: 'dashscope', appId: this.appId };
	}

	/**
	 * Sends the conversation and returns the application's reply text.
	 *
	 * HTTP errors and bodies without `output.text` resolve to `{ ok: false }`.
	 *
	 * @throws {LLMServiceError} If the endpoint is unreachable after every retry
	 */
	async complete(request: CompletionRequest): Promise<CompletionResult> {
		const url = `${this.baseUrl}/apps/${encodeURIComponent(this.appId)}/completion`;
		const body = {
			input: {
				prompt: request.prompt,
				messages: request.messages,
			},
			parameters: {},
			debug: {},
		};

		this.logger.debug(`[DashScope] Calling application ${this.appId}`, {
			messages: request.messages.length,
		});
		const response = await this.post(url, body);

		if (!response.ok) {
			this.logger.error(`[DashScope] API error ${response.status}`, {
				body: response.text.slice(0, 500),
			});
			return {
				ok: false,
				reason: `DashScope API error: ${response.status}`,
				status: response.status,
			};
		}

		let payload: unknown;
		try {
			payload = JSON.parse(response.text);
		} catch (error) {
			this.logger.error('[DashScope] Response body is not JSON', {
				error: error instanceof Error ? error.message : String(error),
			});
			return { ok: false, reason: 'Response body is not JSON' };
		}

		const parsed = ApplicationResponseSchema.safeParse(payload);
		if (!parsed.success) {
			this.logger.warn('[DashScope] Response has no usable output.text', {
				issues: parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
			});
			return { ok: false, reason: 'Response has no usable output.text' };
		}

		const result: Extract<CompletionResult, { ok: true }> = {
			ok: true,
			text: parsed.data.output.text,
		};
		if (parsed.data.request_id) {
			result.requestId = parsed.data.request_id;
		}
		this.logger.debug('[DashScope] Reply received', {
			requestId: parsed.data.request_id,
			length: parsed.data.output.text.length,
		});
		return result;
	}

	// The timeout covers the whole attempt, body included
	private async post(url: string, body: unknown): Promise<HttpReply> {
		for (let attempt = 1; ; attempt++) {
			const controller = new AbortController();
			const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

			try {
				const response = await this.fetchImpl(url, {
					method: 'POST',
					headers: {
						'Content-Type': 'application/json',
						Authorization: `Bearer ${this.apiKey}`,
					},
					body: JSON.stringify(body),
					signal: controller.signal,
				});

				if (isRetryableStatus(response.status) && attempt < this.maxRetries) {
					this.logger.warn(`[DashScope] HTTP ${response.status}, retrying`, {
						attempt,
						maxRetries: this.maxRetries,
					});
					await response.body?.cancel();
					await this.backoff(attempt);
					continue;
				}
				return { ok: response.ok, status: response.status, text: await response.text() };
			} catch (error) {
				const message = error instanceof Error ? error.message : String(error);
				if (attempt >= this.maxRetries) {
					throw new LLMServiceError(
						`Failed to reach DashScope after ${this.maxRetries} attempts: ${message}`,
						error instanceof Error ? error : undefined
					);
				}
				this.logger.warn('[DashScope] Request failed, retrying', { attempt, error: message });
				await this.backoff(attempt);
			} finally {
				clearTimeout(timeoutId);
			}
		}
	}

	private backoff(attempt: number): Promise<void> {
		return new Promise(resolve => setTimeout(resolve, this.retryDelayMs * attempt));
	}
}
