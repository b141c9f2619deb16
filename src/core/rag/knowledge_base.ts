import { IHit, ILogger } from '../../types';
import { normalizeQueryResponse } from './normalize';
import { VectorIndex } from './vector_index';

export const DEFAULT_RESULTS = 5;

/**
 * Query side of the vector index. Whatever shape the collection answers in,
 * callers get `IHit[]`.
 */
export class KnowledgeBase {
	private readonly index: VectorIndex;
	private readonly logger: ILogger;
	private readonly defaultResults: number;

	/**
	 * @param defaultResults - Hits returned when a query names no limit
	 */
	constructor(index: VectorIndex, logger: ILogger, defaultResults: number = DEFAULT_RESULTS) {
		this.index = index;
		this.logger = logger;
		this.defaultResults = defaultResults;
	}

	/**
	 * Errors from the index (unreachable store, missing embeddings) propagate unchanged.
	 */
	public query = async (queryText: string, nResults: number = this.defaultResults): Promise<IHit[]> => {
		const raw = await this.index.query(queryText, nResults);
		const hits = normalizeQueryResponse(raw);
		this.logger.debug(`[KNOWLEDGE_BASE] ${hits.length} hits for query (limit ${nResults})`);
		return hits;
	};
}
