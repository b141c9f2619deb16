import { z } from 'zod';

import { ICollectionQuery, ICollectionUpsert, ILogger, IVectorCollection } from '../../types';
import { EmbeddingUnavailable, ProviderMismatch } from '../../utils/errors';

/**
 * The part of a TypeORM `DataSource` the collection needs.
 */
export interface ISqlExecutor {
	query(sql: string, parameters?: unknown[]): Promise<unknown>;
}

export interface IPostgresCollectionOptions {
	name: string;
	logger: ILogger;
	onClose?: () => Promise<void>;
}

// 6 parameters per row; Postgres caps a statement at 65535
const UPSERT_BATCH_SIZE = 500;

const DimensionRows = z.array(z.object({ dims: z.coerce.number().int() }));
const CountRows = z.array(z.object({ count: z.coerce.number().int() }));
const MatchRows = z.array(
	z.object({
		id: z.string(),
		content: z.string(),
		source: z.string(),
		chunkIndex: z.coerce.number().int(),
		distance: z.coerce.number(),
	})
);

const toVectorLiteral = (vector: number[]): string => `[${vector.join(',')}]`;

/**
 * pgvector-backed collection over the `rag_chunks` table.
 *
 * Records are upserted on (collection, id). Embeddings are never computed here: rows
 * without one are stored for text retrieval only and are skipped by similarity queries,
 * which rank by cosine distance (`<=>`) and answer in the mapping shape.
 */
export class PostgresCollection implements IVectorCollection {
	public readonly name: string;
	public readonly embedsInternally = false;
	private readonly executor: ISqlExecutor;
	private readonly logger: ILogger;
	private readonly onClose?: () => Promise<void>;
	private dimensions: number | null = null;

	constructor(executor: ISqlExecutor, options: IPostgresCollectionOptions) {
		this.executor = executor;
		this.name = options.name;
		this.logger = options.logger;
		this.onClose = options.onClose;
	}

	/**
	 * Dimensionality of the vectors already stored for this collection, if any
	 */
	private detectExistingDimensions = async (): Promise<number | null> => {
		if (this.dimensions !== null) return this.dimensions;

		const rows = DimensionRows.parse(
			await this.executor.query(
				`SELECT vector_dims(embedding) AS dims
				 FROM rag_chunks
				 WHERE collection = $1 AND embedding IS NOT NULL
				 LIMIT 1`,
				[this.name]
			)
		);

		if (rows.length > 0) {
			this.dimensions = rows[0].dims;
			this.logger.debug(`[RAG_REPO] Detected existing embedding dimensions: ${this.dimensions}`);
		}
		return this.dimensions;
	};

	private ensureDimensions = async (vectors: number[][]): Promise<void> => {
		if (vectors.length === 0) return;

		const received = vectors[0].length;
		const inconsistent = vectors.find((vector) => vector.length !== received);
		if (inconsistent) throw new ProviderMismatch(received, inconsistent.length);

		const existing = await this.detectExistingDimensions();
		if (existing !== null && existing !== received) {
			throw new ProviderMismatch(existing, received);
		}
		this.dimensions = received;
	};

	public upsert = async (request: ICollectionUpsert): Promise<void> => {
		const { ids, documents, metadatas, embeddings } = request;
		if (documents.length !== ids.length || metadatas.length !== ids.length || (embeddings && embeddings.length !== ids.length)) {
			throw new Error(`Upsert arrays must have equal lengths (ids: ${ids.length}, documents: ${documents.length}, metadatas: ${metadatas.length})`);
		}
		if (embeddings) await this.ensureDimensions(embeddings);

		// one statement may not touch the same row twice; the last occurrence wins
		const lastIndexById = new Map<string, number>();
		ids.forEach((id, i) => lastIndexById.set(id, i));
		const rows = [...lastIndexById.values()];

		for (let start = 0; start < rows.length; start += UPSERT_BATCH_SIZE) {
			const batch = rows.slice(start, start + UPSERT_BATCH_SIZE);
			const parameters: unknown[] = [];
			const values = batch.map((row, position) => {
				const offset = position * 6;
				const embedding = embeddings?.[row];
				parameters.push(this.name, ids[row], documents[row], metadatas[row].source, metadatas[row].chunk_idx, embedding ? toVectorLiteral(embedding) : null);
				return `($${offset + 1}, $${offset + 2}, $${offset + 3}, $${offset + 4}, $${offset + 5}, $${offset + 6}::vector)`;
			});

			await this.executor.query(
				`INSERT INTO rag_chunks (collection, id, content, source, "chunkIndex", embedding)
				 VALUES ${values.join(', ')}
				 ON CONFLICT (collection, id) DO UPDATE SET
					 content = EXCLUDED.content,
					 source = EXCLUDED.source,
					 "chunkIndex" = EXCLUDED."chunkIndex",
					 embedding = EXCLUDED.embedding,
					 "updatedAt" = now()`,
				parameters
			);
			this.logger.debug(`[RAG_REPO] Stored chunks ${start + 1}-${start + batch.length}/${rows.length}`);
		}
	};

	/**
	 * @throws {EmbeddingUnavailable} When called with query text only
	 */
	public query = async (request: ICollectionQuery): Promise<unknown> => {
		if (!request.queryEmbeddings) {
			throw new EmbeddingUnavailable(`Collection '${this.name}' cannot embed query text`);
		}

		const ids: string[][] = [];
		const documents: string[][] = [];
		const metadatas: { source: string; chunk_idx: number }[][] = [];
		const distances: number[][] = [];

		for (const queryEmbedding of request.queryEmbeddings) {
			const existing = await this.detectExistingDimensions();
			if (existing !== null && existing !== queryEmbedding.length) {
				throw new ProviderMismatch(existing, queryEmbedding.length);
			}

			const rows = MatchRows.parse(
				await this.executor.query(
					`SELECT id, content, source, "chunkIndex", (embedding <=> $2::vector) AS distance
					 FROM rag_chunks
					 WHERE collection = $1 AND embedding IS NOT NULL
					 ORDER BY embedding <=> $2::vector
					 LIMIT $3`,
					[this.name, toVectorLiteral(queryEmbedding), request.nResults]
				)
			);

			ids.push(rows.map((row) => row.id));
			documents.push(rows.map((row) => row.content));
			metadatas.push(rows.map((row) => ({ source: row.source, chunk_idx: row.chunkIndex })));
			distances.push(rows.map((row) => row.distance));
		}

		return { ids, documents, metadatas, distances };
	};

	public count = async (): Promise<number> => {
		const rows = CountRows.parse(await this.executor.query('SELECT COUNT(*)::int AS count FROM rag_chunks WHERE collection = $1', [this.name]));
		return rows[0]?.count ?? 0;
	};

	public close = async (): Promise<void> => {
		await this.onClose?.();
	};
}
