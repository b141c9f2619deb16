import path from 'path';

import { IChunkMetadata, IChunkingOptions, IDocument, ILogger } from '../../types';
import { InvalidConfiguration } from '../../utils/errors';
import { chunkDocument } from './chunker';
import { readDocument } from './reader';
import { VectorIndex } from './vector_index';

/**
 * Groups names that occur more than once, keyed by the value that collides.
 */
const findCollisions = (names: string[], keyOf: (name: string) => string): Map<string, string[]> => {
	const groups = new Map<string, string[]>();
	for (const name of names) {
		const key = keyOf(name);
		groups.set(key, [...(groups.get(key) ?? []), name]);
	}
	return new Map([...groups].filter(([, members]) => members.length > 1));
};

const describeCollisions = (collisions: Map<string, string[]>): string =>
	[...collisions].map(([key, members]) => `'${key}' (${members.join(', ')})`).join('; ');

export interface IIngestorOptions {
	index: VectorIndex;
	logger: ILogger;
	chunking?: IChunkingOptions;
}

/**
 * Reads, chunks and upserts documents. Each call upserts one batch.
 */
export class Ingestor {
	private readonly index: VectorIndex;
	private readonly logger: ILogger;
	private readonly chunking: IChunkingOptions;

	constructor(options: IIngestorOptions) {
		this.index = options.index;
		this.logger = options.logger;
		this.chunking = options.chunking ?? {};
	}

	/**
	 * @returns {Promise<number>} - The number of chunks upserted
	 */
	public ingestDocuments = async (documents: IDocument[]): Promise<number> => {
		// chunk ids derive from the filename and must be unique within the batch
		const collisions = findCollisions(
			documents.map((document) => document.filename),
			(filename) => filename
		);
		if (collisions.size > 0) {
			throw new InvalidConfiguration(`Documents share a filename: ${[...collisions.keys()].join(', ')}`);
		}

		const ids: string[] = [];
		const texts: string[] = [];
		const metadatas: IChunkMetadata[] = [];

		for (const document of documents) {
			const chunks = chunkDocument(document.filename, document.text, this.chunking);
			for (const chunk of chunks) {
				ids.push(chunk.id);
				texts.push(chunk.text);
				metadatas.push({ source: chunk.source, chunk_idx: chunk.index });
			}
			this.logger.debug(`[INGEST] ${document.filename}: ${chunks.length} chunks`);
		}

		if (ids.length === 0) {
			this.logger.warn('[INGEST] Nothing to ingest');
			return 0;
		}

		await this.index.upsert(ids, texts, metadatas);
		this.logger.success(`[INGEST] Ingested ${ids.length} chunks from ${documents.length} documents into '${this.index.collectionName}'`);
		return ids.length;
	};

	/**
	 * Reads files by extension and ingests them. Read failures propagate.
	 * Files with the same basename are rejected before anything is read.
	 */
	public ingestFiles = async (paths: string[]): Promise<number> => {
		const collisions = findCollisions(paths, (filePath) => path.basename(filePath));
		if (collisions.size > 0) {
			throw new InvalidConfiguration(`Files share a name and would produce the same chunk ids: ${describeCollisions(collisions)}`);
		}

		const documents: IDocument[] = [];
		for (const filePath of paths) {
			documents.push(await readDocument(filePath));
		}
		return this.ingestDocuments(documents);
	};
}
