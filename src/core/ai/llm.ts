import timers from 'timers/promises';
import { OpenAI } from 'openai';

import { ILogger } from '../../types';

export const SYSTEM_PROMPT = 'You are a QA test-case and Selenium script generator. Base answers strictly on provided context. No hallucinations.';

/**
 * Anything that turns a prompt into free-form text.
 */
export interface IGenerator {
	generate(prompt: string): Promise<string>;
}

export interface ILLMOptions {
	apiKey: string;
	baseUrl: string;
	model: string;
	maxTokens?: number;
	temperature?: number;
	maxRetries?: number;
	retryDelayMs?: number;
}

const isRetryable = (error: unknown): boolean => {
	return error instanceof OpenAI.APIError && error.status !== undefined && (error.status === 429 || error.status >= 500);
};

/**
 * LLM class for interacting with OpenAI-compatible chat completion APIs.
 */
export class LLM implements IGenerator {
	private readonly openai_client: OpenAI;
	private readonly model: string;
	private readonly maxTokens: number;
	private readonly temperature: number;
	private readonly maxRetries: number;
	private readonly retryDelayMs: number;
	private readonly logger: ILogger;

	constructor(options: ILLMOptions, logger: ILogger) {
		this.openai_client = new OpenAI({
			baseURL: options.baseUrl,
			apiKey: options.apiKey,
			// retries are handled by invoke
			maxRetries: 0,
		});
		this.model = options.model;
		this.maxTokens = options.maxTokens ?? 1024;
		this.temperature = options.temperature ?? 0;
		this.maxRetries = options.maxRetries ?? 3;
		this.retryDelayMs = options.retryDelayMs ?? 1000;
		this.logger = logger;
	}

	/**
	 * Invokes the LLM with the given messages.
	 * Rate limits and server errors are retried with exponential backoff.
	 * @throws {Error} - Throws an error if the API request fails.
	 */
	public async invoke(messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[]): Promise<OpenAI.Chat.Completions.ChatCompletion> {
		let retries = 0;

		while (true) {
			try {
				return await this.openai_client.chat.completions.create({
					model: this.model,
					messages: messages,
					max_tokens: this.maxTokens,
					temperature: this.temperature,
				});
			} catch (error) {
				retries++;

				if (retries <= this.maxRetries && isRetryable(error)) {
					const delay = this.retryDelayMs * Math.pow(2, retries - 1);
					this.logger.warn(`[LLM] API request failed, retrying in ${delay}ms: ${error instanceof Error ? error.message : String(error)}`);
					await timers.setTimeout(delay);
				} else {
					throw error;
				}
			}
		}
	}

	public generate = async (prompt: string): Promise<string> => {
		const response = await this.invoke([
			{ role: 'system', content: SYSTEM_PROMPT },
			{ role: 'user', content: prompt },
		]);
		return response.choices[0]?.message.content ?? '';
	};
}

/**
 * Stand-in used when no API key is configured; every call fails with a pointer to the fix.
 */
export class UnconfiguredGenerator implements IGenerator {
	public generate = async (): Promise<string> => {
		throw new Error('No generation backend configured: set OPENAI_API_KEY (and OPENAI_BASE_URL for a self-hosted OpenAI-compatible server)');
	};
}
