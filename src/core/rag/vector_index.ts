import { IChunkMetadata, ILogger, IVectorCollection } from '../../types';
import { EmbeddingUnavailable, InvalidConfiguration, ProviderMismatch, errorMessage } from '../../utils/errors';

export interface IEmbedder {
	embed(texts: string[]): Promise<number[][]>;
}

export interface IVectorIndexOptions {
	collection: IVectorCollection;
	embedding: IEmbedder;
	logger: ILogger;
}

/**
 * Chunk store with nearest-neighbour lookup over an `IVectorCollection`.
 *
 * Embeddings come from the injected embedder when it can produce them. Without one,
 * records are stored as text only and queries go to the collection as text, which
 * works only for collections that embed internally.
 */
export class VectorIndex {
	private readonly collection: IVectorCollection;
	private readonly embedding: IEmbedder;
	private readonly logger: ILogger;
	private dimensions: number | null = null;

	constructor(options: IVectorIndexOptions) {
		this.collection = options.collection;
		this.embedding = options.embedding;
		this.logger = options.logger;
	}

	public get collectionName(): string {
		return this.collection.name;
	}

	private trackDimensions = (vectors: number[][]): void => {
		for (const vector of vectors) {
			if (this.dimensions === null) {
				this.dimensions = vector.length;
			} else if (vector.length !== this.dimensions) {
				throw new ProviderMismatch(this.dimensions, vector.length);
			}
		}
	};

	/**
	 * Returns embeddings for the texts, or null when no embedding provider is active
	 */
	private tryEmbed = async (texts: string[]): Promise<number[][] | null> => {
		try {
			const vectors = await this.embedding.embed(texts);
			this.trackDimensions(vectors);
			return vectors;
		} catch (error) {
			if (error instanceof EmbeddingUnavailable) {
				this.logger.debug(`[VECTOR_INDEX] ${error.message}`);
				return null;
			}
			throw error;
		}
	};

	/**
	 * Inserts or replaces records by id (last write wins), then flushes the collection
	 * when it supports flushing.
	 */
	public upsert = async (ids: string[], documents: string[], metadatas: IChunkMetadata[]): Promise<void> => {
		if (documents.length !== ids.length || metadatas.length !== ids.length) {
			throw new InvalidConfiguration(`Upsert arrays must have equal lengths (ids: ${ids.length}, documents: ${documents.length}, metadatas: ${metadatas.length})`);
		}
		if (ids.length === 0) return;

		const embeddings = await this.tryEmbed(documents);
		if (!embeddings) {
			this.logger.info(`[VECTOR_INDEX] Storing ${ids.length} records without embeddings`);
		}

		await this.collection.upsert({ ids, documents, metadatas, ...(embeddings ? { embeddings } : {}) });
		this.logger.debug(`[VECTOR_INDEX] Upserted ${ids.length} records into '${this.collection.name}'`);

		if (this.collection.persist) {
			try {
				await this.collection.persist();
			} catch (error) {
				this.logger.warn(`[VECTOR_INDEX] Failed to persist '${this.collection.name}': ${errorMessage(error)}`);
			}
		}
	};

	/**
	 * Runs a similarity query and returns the collection's response untouched.
	 * `nResults` is an upper bound; smaller collections answer with fewer records.
	 * @throws {EmbeddingUnavailable} When no provider is active and the collection cannot embed text
	 */
	public query = async (queryText: string, nResults: number): Promise<unknown> => {
		if (!Number.isInteger(nResults) || nResults < 1) {
			throw new InvalidConfiguration(`nResults must be a positive integer, got ${nResults}`);
		}

		const queryEmbeddings = await this.tryEmbed([queryText]);
		if (queryEmbeddings) {
			return this.collection.query({ queryEmbeddings, nResults });
		}

		if (!this.collection.embedsInternally) {
			throw new EmbeddingUnavailable(`No embedding provider is available and collection '${this.collection.name}' cannot embed queries`);
		}
		return this.collection.query({ queryTexts: [queryText], nResults });
	};

	public count = async (): Promise<number> => {
		return this.collection.count();
	};
}
