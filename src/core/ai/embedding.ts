import { ILogger } from '../../types';
import { EmbeddingUnavailable, ProviderMismatch, errorMessage } from '../../utils/errors';

export type BatchEmbedder = (texts: string[]) => Promise<number[][]>;

/**
 * The backend an `Embedding` runs on, fixed at construction.
 */
export type EmbeddingBackend =
	| { kind: 'remote'; model: string; embedBatch: BatchEmbedder }
	| { kind: 'local'; model: string; embedBatch: BatchEmbedder }
	| { kind: 'disabled'; reason: string };

export interface IRemoteEmbeddingOptions {
	apiKey: string;
	baseUrl: string;
	model: string;
}

export interface IEmbeddingLoaders {
	remote: (options: IRemoteEmbeddingOptions) => Promise<BatchEmbedder>;
	local: (model: string) => Promise<BatchEmbedder>;
}

export interface IEmbeddingSelection {
	apiKey?: string;
	baseUrl: string;
	remoteModel: string;
	localModel: string;
}

/**
 * Embedding capability used by the vector index.
 * Callers only see `embed`; which backend answers is decided once by `selectEmbeddingProvider`.
 */
export class Embedding {
	private readonly backend: EmbeddingBackend;
	private detectedDimensions: number | null = null;

	constructor(backend: EmbeddingBackend) {
		this.backend = backend;
	}

	public get kind(): EmbeddingBackend['kind'] {
		return this.backend.kind;
	}

	public get description(): string {
		return this.backend.kind === 'disabled' ? `disabled (${this.backend.reason})` : `${this.backend.kind}:${this.backend.model}`;
	}

	/**
	 * Generates one embedding per input text.
	 * @throws {EmbeddingUnavailable} When the provider is disabled
	 * @throws {ProviderMismatch} When the vectors disagree on dimensionality, within the batch or with earlier batches
	 */
	public embed = async (texts: string[]): Promise<number[][]> => {
		if (this.backend.kind === 'disabled') {
			throw new EmbeddingUnavailable(`Embeddings are disabled: ${this.backend.reason}`);
		}
		if (texts.length === 0) return [];

		const vectors = await this.backend.embedBatch(texts);
		if (vectors.length !== texts.length) {
			throw new Error(`Embedding backend returned ${vectors.length} vectors for ${texts.length} texts`);
		}

		for (const vector of vectors) {
			if (this.detectedDimensions === null) {
				this.detectedDimensions = vector.length;
			} else if (vector.length !== this.detectedDimensions) {
				throw new ProviderMismatch(this.detectedDimensions, vector.length);
			}
		}

		return vectors;
	};

	/**
	 * Get cached dimensions if available
	 * @returns {number | null} - null until the first batch has been embedded
	 */
	public getCachedDimensions = (): number | null => {
		return this.detectedDimensions;
	};
}

/**
 * OpenAI embeddings through the official SDK. The module is loaded on demand so a
 * missing client library surfaces as a load failure rather than an import error.
 */
export const loadRemoteEmbedder = async (options: IRemoteEmbeddingOptions): Promise<BatchEmbedder> => {
	const { OpenAI } = await import('openai');
	const client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl });

	return async (texts: string[]): Promise<number[][]> => {
		const response = await client.embeddings.create({ model: options.model, input: texts });
		return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
	};
};

/**
 * Local sentence embeddings via a `@huggingface/transformers` feature-extraction pipeline
 * (mean pooling, normalized). Loading downloads the model on first use.
 */
export const loadLocalEmbedder = async (model: string): Promise<BatchEmbedder> => {
	const { pipeline } = await import('@huggingface/transformers');
	const extractor = await pipeline('feature-extraction', model);

	return async (texts: string[]): Promise<number[][]> => {
		const vectors: number[][] = [];
		for (const text of texts) {
			const output = await extractor(text, { pooling: 'mean', normalize: true });
			const data: ArrayLike<unknown> = output.data;
			vectors.push(Array.from(data, Number));
		}
		return vectors;
	};
};

export const defaultEmbeddingLoaders: IEmbeddingLoaders = {
	remote: loadRemoteEmbedder,
	local: loadLocalEmbedder,
};

/**
 * Picks the embedding backend for the process, in priority order:
 * remote when an API key is set and the client loads, local when the model loads,
 * disabled otherwise. Load failures are logged and never thrown.
 */
export const selectEmbeddingProvider = async (
	selection: IEmbeddingSelection,
	logger: ILogger,
	loaders: IEmbeddingLoaders = defaultEmbeddingLoaders
): Promise<Embedding> => {
	if (selection.apiKey) {
		try {
			const embedBatch = await loaders.remote({ apiKey: selection.apiKey, baseUrl: selection.baseUrl, model: selection.remoteModel });
			logger.info(`[EMBEDDING] Using OpenAI embeddings (${selection.remoteModel})`);
			return new Embedding({ kind: 'remote', model: selection.remoteModel, embedBatch });
		} catch (error) {
			logger.warn(`[EMBEDDING] OpenAI client unavailable, trying local model: ${errorMessage(error)}`);
		}
	}

	try {
		const embedBatch = await loaders.local(selection.localModel);
		logger.info(`[EMBEDDING] Loaded local model '${selection.localModel}'`);
		return new Embedding({ kind: 'local', model: selection.localModel, embedBatch });
	} catch (error) {
		logger.warn(`[EMBEDDING] Failed to load local model '${selection.localModel}': ${errorMessage(error)}`);
		logger.warn('[EMBEDDING] Embeddings disabled until a model or OPENAI_API_KEY is available');
		return new Embedding({ kind: 'disabled', reason: 'no remote credential and no local model' });
	}
};
