import fs from 'fs/promises';

import { IContextBundle, ILogger, TestCaseResult } from '../../types';
import { GenerationParseFailure, errorMessage } from '../../utils/errors';
import { extractJsonArray } from '../../utils/json';
import { IGenerator } from '../ai/llm';
import { buildContext } from '../rag/context';
import { KnowledgeBase } from '../rag/knowledge_base';
import { seleniumPrompt, testCasePrompt } from './prompts';
import { matchFeatureKeyword, synthesize } from './synthesizer';

export const DEFAULT_RETRIEVAL_K = 6;
export const FALLBACK_NOTE = 'LLM fallback failed to return clean JSON; returning developer fallback if available.';

export interface IQaAgentOptions {
	knowledgeBase: KnowledgeBase;
	generator: IGenerator;
	logger: ILogger;
	retrievalK?: number;
	fallbackPath?: string | null;
}

/**
 * Turns requests into grounded test cases and Selenium scripts.
 */
export class QaAgent {
	private readonly knowledgeBase: KnowledgeBase;
	private readonly generator: IGenerator;
	private readonly logger: ILogger;
	private readonly retrievalK: number;
	private readonly fallbackPath: string | null;

	constructor(options: IQaAgentOptions) {
		this.knowledgeBase = options.knowledgeBase;
		this.generator = options.generator;
		this.logger = options.logger;
		this.retrievalK = options.retrievalK ?? DEFAULT_RETRIEVAL_K;
		this.fallbackPath = options.fallbackPath ?? null;
	}

	public buildContext = async (userQuery: string, k: number = this.retrievalK): Promise<IContextBundle> => {
		const hits = await this.knowledgeBase.query(userQuery, k);
		return buildContext(hits, this.logger);
	};

	/**
	 * Generation failures are reported as text so the caller always gets something to show.
	 */
	private callGenerator = async (prompt: string): Promise<string> => {
		try {
			return await this.generator.generate(prompt);
		} catch (error) {
			this.logger.error(`[AGENT] Generation failed: ${errorMessage(error)}`);
			return `LLM call failed: ${errorMessage(error)}`;
		}
	};

	/**
	 * Developer-maintained test cases returned when generated output cannot be parsed
	 */
	private loadFallback = async (): Promise<unknown[]> => {
		if (!this.fallbackPath) return [];

		let contents: string;
		try {
			contents = await fs.readFile(this.fallbackPath, 'utf8');
		} catch (error) {
			this.logger.debug(`[AGENT] No fallback test cases at ${this.fallbackPath}: ${errorMessage(error)}`);
			return [];
		}

		try {
			const parsed: unknown = JSON.parse(contents);
			if (Array.isArray(parsed)) return parsed;
			this.logger.warn(`[AGENT] Fallback file ${this.fallbackPath} does not hold a JSON array`);
		} catch (error) {
			this.logger.warn(`[AGENT] Fallback file ${this.fallbackPath} is not valid JSON: ${errorMessage(error)}`);
		}
		return [];
	};

	/**
	 * Recognized features are answered by the synthesizer without calling the generator.
	 * Other requests go to the generator; unparseable output comes back as
	 * `{ raw, note, testcases }` with the fallback list.
	 */
	public generateTestCases = async (userQuery: string): Promise<TestCaseResult> => {
		const { context, sources } = await this.buildContext(userQuery);

		const keyword = matchFeatureKeyword(userQuery);
		if (keyword) {
			this.logger.info(`[AGENT] '${keyword}' recognized, synthesizing canonical test cases`);
			return { testcases: synthesize(keyword, sources) };
		}

		const raw = await this.callGenerator(testCasePrompt(context, userQuery));

		try {
			return { testcases: extractJsonArray(raw) };
		} catch (error) {
			if (!(error instanceof GenerationParseFailure)) throw error;
			this.logger.warn(`[AGENT] ${error.message}`);
		}

		return { raw, note: FALLBACK_NOTE, testcases: await this.loadFallback() };
	};

	/**
	 * Asks the generator for a standalone Python Selenium script; its text is returned as is.
	 */
	public generateSeleniumScript = async (testCase: Record<string, unknown>, html: string): Promise<string> => {
		const scenario = typeof testCase.Test_Scenario === 'string' ? testCase.Test_Scenario : '';
		const { context } = await this.buildContext(scenario);
		return this.callGenerator(seleniumPrompt(testCase, html, context));
	};
}
