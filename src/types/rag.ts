export interface IChunkMetadata {
	source: string;
	chunk_idx: number;
}

export interface IChunk {
	id: string;
	source: string;
	index: number;
	text: string;
}

export interface IChunkingOptions {
	chunkSize?: number;
	overlap?: number;
}

export interface IDocument {
	filename: string;
	text: string;
}

/**
 * One normalized query result. `metadata` is whatever the store returned for the
 * record and is resolved later by the context builder.
 */
export interface IHit {
	document: string;
	metadata: unknown;
	distance: number | null;
}

export interface IContextBundle {
	context: string;
	sources: string[];
}

export interface ICollectionUpsert {
	ids: string[];
	documents: string[];
	metadatas: IChunkMetadata[];
	embeddings?: number[][];
}

export interface ICollectionQuery {
	queryTexts?: string[];
	queryEmbeddings?: number[][];
	nResults: number;
}

/**
 * Underlying store the vector index runs over. Query responses are left untyped:
 * stores answer either with a mapping of `documents`/`metadatas`/`distances` or with
 * a positional `[documents, metadatas, distances]` list.
 */
export interface IVectorCollection {
	readonly name: string;
	readonly embedsInternally: boolean;
	upsert(records: ICollectionUpsert): Promise<void>;
	query(request: ICollectionQuery): Promise<unknown>;
	count(): Promise<number>;
	persist?(): Promise<void>;
	close?(): Promise<void>;
}
