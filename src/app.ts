import path from 'path';

import { IEmbeddingLoaders, LLM, IGenerator, UnconfiguredGenerator, selectEmbeddingProvider } from './core/ai';
import { QaAgent } from './core/qa';
import { Ingestor, KnowledgeBase, PersistentMemoryCollection, VectorIndex } from './core/rag';
import { openPostgresCollection } from './database/connect/connect_postgres';
import { IApp, ILogger, ISettings, IVectorCollection } from './types';
import { ConfigManager, loadSettings } from './utils/config';
import Logger from './utils/logger';

export interface IAppOverrides {
	logger?: ILogger;
	settings?: ISettings;
	collection?: IVectorCollection;
	embeddingLoaders?: IEmbeddingLoaders;
	generator?: IGenerator;
}

export const createLogger = (config: ConfigManager): ILogger => {
	return new Logger({
		debug: config.isDebugMode(),
		logDir: config.isFileLoggingEnabled() ? 'logs' : null,
	});
};

const openCollection = async (config: ConfigManager, logger: ILogger): Promise<IVectorCollection> => {
	const uri = config.getPostgresUri();
	if (uri) {
		return openPostgresCollection({ uri, collectionName: config.getCollectionName(), debug: config.isDebugMode() }, logger);
	}

	const collection = await PersistentMemoryCollection.open(config.getCollectionName(), path.resolve(config.getVectorStorePath()));
	logger.info(`[APP] Using local vector store at ${collection.getFilePath()} (${await collection.count()} records)`);
	return collection;
};

const createGenerator = (config: ConfigManager, settings: ISettings, logger: ILogger): IGenerator => {
	const apiKey = config.getOpenAIApiKey();
	if (!apiKey) {
		logger.warn('[APP] OPENAI_API_KEY is not set, free-form generation is unavailable');
		return new UnconfiguredGenerator();
	}

	return new LLM(
		{
			apiKey,
			baseUrl: config.getOpenAIBaseUrl(),
			model: config.getOpenAIModel(),
			maxTokens: settings.generation.max_tokens,
			temperature: settings.generation.temperature,
		},
		logger
	);
};

/**
 * Wires the pipeline: settings, embedding provider, collection, index,
 * knowledge base, ingestor, generation backend and agent, in that order.
 */
export const createApp = async (config: ConfigManager, overrides: IAppOverrides = {}): Promise<IApp> => {
	const logger = overrides.logger ?? createLogger(config);
	const settings = overrides.settings ?? loadSettings(config.getSettingsPath());

	const embedding = await selectEmbeddingProvider(
		{
			apiKey: config.getOpenAIApiKey(),
			baseUrl: config.getOpenAIBaseUrl(),
			remoteModel: config.getOpenAIEmbeddingModel(),
			localModel: config.getLocalEmbeddingModel(),
		},
		logger,
		overrides.embeddingLoaders
	);
	logger.debug(`[APP] Embedding provider: ${embedding.description}`);

	const collection = overrides.collection ?? (await openCollection(config, logger));
	const index = new VectorIndex({ collection, embedding, logger });
	const knowledgeBase = new KnowledgeBase(index, logger, settings.retrieval.default_results);
	const ingestor = new Ingestor({
		index,
		logger,
		chunking: { chunkSize: settings.ingest.chunk_size, overlap: settings.ingest.chunk_overlap },
	});

	const agent = new QaAgent({
		knowledgeBase,
		generator: overrides.generator ?? createGenerator(config, settings, logger),
		logger,
		retrievalK: settings.retrieval.top_k,
		fallbackPath: path.resolve(settings.generation.fallback_path),
	});

	return {
		settings,
		logger,
		embedding,
		index,
		knowledgeBase,
		ingestor,
		agent,
		close: async () => {
			await collection.close?.();
		},
	};
};
