import fs from 'fs';
import yaml from 'yaml';
import path from 'path';
import { z } from 'zod';
import { config } from 'dotenv';

import { IEnvironment, ISettings } from '../types';
import { InvalidConfiguration } from './errors';

const booleanish = z.union([z.boolean(), z.string()]).transform((val) => {
	if (typeof val === 'string') {
		return val.toLowerCase() === 'true';
	}
	return val;
});

const optionalString = z
	.string()
	.optional()
	.transform((val) => (val && val.trim() ? val.trim() : undefined));

/**
 * Schema for validating environment variables
 * Everything except the OpenAI key and the Postgres URI has a default
 */
const EnvSchema = z.object({
	OPENAI_API_KEY: optionalString,
	OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
	OPENAI_MODEL: z.string().min(1).default('gpt-3.5-turbo'),
	OPENAI_EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
	LOCAL_EMBEDDING_MODEL: z.string().min(1).default('Xenova/all-MiniLM-L6-v2'),
	POSTGRES_URI: optionalString,
	VECTOR_STORE_PATH: z.string().min(1).default('chromadb_store'),
	COLLECTION_NAME: z
		.string()
		.regex(/^[a-z_][a-z0-9_]*$/, 'Collection name must be a lowercase SQL identifier')
		.default('qa_agent'),
	DEBUG_MODE: booleanish.default(false),
	LOG_TO_FILE: booleanish.default(false),
	QA_FORGE_CONFIG: optionalString,
});

const SettingsSchema = z.object({
	ingest: z
		.object({
			chunk_size: z.number().int().positive().default(800),
			chunk_overlap: z.number().int().nonnegative().default(100),
		})
		.default({}),
	retrieval: z
		.object({
			top_k: z.number().int().positive().default(6),
			default_results: z.number().int().positive().default(5),
		})
		.default({}),
	generation: z
		.object({
			fallback_path: z.string().min(1).default('testcases.json'),
			max_tokens: z.number().int().positive().default(1024),
			temperature: z.number().min(0).max(2).default(0),
		})
		.default({}),
});

const describeIssues = (error: z.ZodError): string => error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join(', ');

/**
 * Manages application configuration using environment variables
 * `getInstance` keeps one process-wide configuration; `fromEnv` builds isolated ones
 * @class ConfigManager
 */
export class ConfigManager {
	private static instance: ConfigManager;
	private readonly config: IEnvironment;

	/**
	 * @throws {InvalidConfiguration} If the environment does not validate
	 */
	private constructor(env: NodeJS.ProcessEnv) {
		const result = EnvSchema.safeParse({
			...env,
			DEBUG_MODE: env.DEBUG_MODE || false,
			LOG_TO_FILE: env.LOG_TO_FILE || false,
		});

		if (!result.success) {
			throw new InvalidConfiguration(`Missing or invalid environment variables: ${describeIssues(result.error)}`);
		}
		this.config = result.data;
	}

	/**
	 * Builds a configuration from an explicit environment, bypassing the singleton
	 */
	public static fromEnv(env: NodeJS.ProcessEnv): ConfigManager {
		return new ConfigManager(env);
	}

	/**
	 * Gets the singleton instance of ConfigManager
	 * Loads `.env.<NODE_ENV>` (or `.env`) into the process environment on first use
	 * @static
	 * @returns {ConfigManager} The singleton ConfigManager instance
	 */
	public static getInstance(): ConfigManager {
		if (!ConfigManager.instance) {
			const environment = process.env.NODE_ENV || 'development';
			const envPath = path.resolve(process.cwd(), `.env.${environment}`);
			config(fs.existsSync(envPath) ? { path: envPath } : {});
			ConfigManager.instance = new ConfigManager(process.env);
		}
		return ConfigManager.instance;
	}

	/**
	 * Gets the OpenAI API key, or undefined when remote services are not configured
	 */
	public getOpenAIApiKey(): string | undefined {
		return this.config.OPENAI_API_KEY;
	}

	public getOpenAIBaseUrl(): string {
		return this.config.OPENAI_BASE_URL;
	}

	public getOpenAIModel(): string {
		return this.config.OPENAI_MODEL;
	}

	public getOpenAIEmbeddingModel(): string {
		return this.config.OPENAI_EMBEDDING_MODEL;
	}

	public getLocalEmbeddingModel(): string {
		return this.config.LOCAL_EMBEDDING_MODEL;
	}

	/**
	 * Gets the PostgreSQL connection URI
	 * @returns {string | undefined} Undefined selects the in-process collection
	 */
	public getPostgresUri(): string | undefined {
		return this.config.POSTGRES_URI;
	}

	public getVectorStorePath(): string {
		return this.config.VECTOR_STORE_PATH;
	}

	public getCollectionName(): string {
		return this.config.COLLECTION_NAME;
	}

	public isDebugMode(): boolean {
		return this.config.DEBUG_MODE;
	}

	public isFileLoggingEnabled(): boolean {
		return this.config.LOG_TO_FILE;
	}

	/**
	 * Path of the YAML settings file, relative to the working directory
	 */
	public getSettingsPath(): string {
		return path.resolve(process.cwd(), this.config.QA_FORGE_CONFIG ?? path.join('config', 'config.yml'));
	}
}

/**
 * Loads pipeline settings from a YAML file
 * A missing file yields the defaults
 * @throws {InvalidConfiguration} If the file is not valid YAML or does not validate
 */
export const loadSettings = (settingsPath: string): ISettings => {
	let document: unknown = {};

	if (fs.existsSync(settingsPath)) {
		try {
			document = yaml.parse(fs.readFileSync(settingsPath, 'utf8')) ?? {};
		} catch (error) {
			throw new InvalidConfiguration(`Failed to parse settings file ${settingsPath}: ${error instanceof Error ? error.message : String(error)}`);
		}
	}

	const result = SettingsSchema.safeParse(document);
	if (!result.success) {
		throw new InvalidConfiguration(`Invalid settings in ${settingsPath}: ${describeIssues(result.error)}`);
	}

	const settings = result.data;
	if (settings.ingest.chunk_overlap >= settings.ingest.chunk_size) {
		throw new InvalidConfiguration(`chunk_overlap (${settings.ingest.chunk_overlap}) must be smaller than chunk_size (${settings.ingest.chunk_size})`);
	}
	return settings;
};
