import path from 'path';
import fs from 'fs/promises';
import { z } from 'zod';

import { ICollectionQuery, ICollectionUpsert, IChunkMetadata, IVectorCollection } from '../../types';
import { IndexUnavailable, ProviderMismatch } from '../../utils/errors';
import { cosineDistance, lexicalVector } from './lexical';

interface IStoredRecord {
	id: string;
	document: string;
	metadata: IChunkMetadata;
	embedding: number[];
}

const SnapshotSchema = z.object({
	name: z.string(),
	dimensions: z.number().int().positive().nullable(),
	records: z.array(
		z.object({
			id: z.string(),
			document: z.string(),
			metadata: z.object({ source: z.string(), chunk_idx: z.number().int() }),
			embedding: z.array(z.number()),
		})
	),
});

type Snapshot = z.infer<typeof SnapshotSchema>;

/**
 * In-process vector collection.
 *
 * Records without a supplied embedding are embedded lexically, which lets the index
 * answer text queries when no embedding provider is active. Answers use the mapping
 * shape with one inner list per query.
 */
export class MemoryCollection implements IVectorCollection {
	public readonly name: string;
	public readonly embedsInternally = true;
	protected readonly records = new Map<string, IStoredRecord>();
	protected dimensions: number | null = null;

	constructor(name: string) {
		this.name = name;
	}

	private checkDimensions = (received: number): void => {
		if (this.dimensions === null) {
			this.dimensions = received;
		} else if (this.dimensions !== received) {
			throw new ProviderMismatch(this.dimensions, received);
		}
	};

	public upsert = async (request: ICollectionUpsert): Promise<void> => {
		const { ids, documents, metadatas, embeddings } = request;
		if (documents.length !== ids.length || metadatas.length !== ids.length || (embeddings && embeddings.length !== ids.length)) {
			throw new Error(`Upsert arrays must have equal lengths (ids: ${ids.length}, documents: ${documents.length}, metadatas: ${metadatas.length})`);
		}

		const vectors = embeddings ?? documents.map((document) => lexicalVector(document));
		vectors.forEach((vector) => this.checkDimensions(vector.length));

		ids.forEach((id, i) => {
			this.records.set(id, { id, document: documents[i], metadata: { ...metadatas[i] }, embedding: vectors[i] });
		});
	};

	public query = async (request: ICollectionQuery): Promise<unknown> => {
		const queryVectors = request.queryEmbeddings ?? request.queryTexts?.map((text) => lexicalVector(text));
		if (!queryVectors) {
			throw new Error('Query needs queryTexts or queryEmbeddings');
		}

		const ids: string[][] = [];
		const documents: string[][] = [];
		const metadatas: IChunkMetadata[][] = [];
		const distances: number[][] = [];

		for (const queryVector of queryVectors) {
			if (this.dimensions !== null) this.checkDimensions(queryVector.length);

			const ranked = [...this.records.values()]
				.map((record) => ({ record, distance: cosineDistance(queryVector, record.embedding) }))
				.sort((a, b) => a.distance - b.distance)
				.slice(0, request.nResults);

			ids.push(ranked.map(({ record }) => record.id));
			documents.push(ranked.map(({ record }) => record.document));
			metadatas.push(ranked.map(({ record }) => ({ ...record.metadata })));
			distances.push(ranked.map(({ distance }) => distance));
		}

		return { ids, documents, metadatas, distances };
	};

	public count = async (): Promise<number> => {
		return this.records.size;
	};

	protected toSnapshot = (): Snapshot => ({
		name: this.name,
		dimensions: this.dimensions,
		records: [...this.records.values()],
	});

	protected restore = (snapshot: Snapshot): void => {
		this.dimensions = snapshot.dimensions;
		for (const record of snapshot.records) {
			this.records.set(record.id, record);
		}
	};
}

/**
 * Memory collection mirrored to `<directory>/<name>.json`; `persist` flushes it.
 */
export class PersistentMemoryCollection extends MemoryCollection {
	private readonly filePath: string;

	private constructor(name: string, directory: string) {
		super(name);
		this.filePath = path.join(directory, `${name}.json`);
	}

	/**
	 * Opens the collection, restoring the last flushed snapshot if one exists
	 * @throws {IndexUnavailable} When the snapshot cannot be read or is corrupt
	 */
	public static async open(name: string, directory: string): Promise<PersistentMemoryCollection> {
		const collection = new PersistentMemoryCollection(name, directory);

		let contents: string;
		try {
			contents = await fs.readFile(collection.filePath, 'utf8');
		} catch (error) {
			if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
				return collection;
			}
			throw new IndexUnavailable(error);
		}

		try {
			collection.restore(SnapshotSchema.parse(JSON.parse(contents)));
		} catch (error) {
			throw new IndexUnavailable(error);
		}
		return collection;
	}

	public persist = async (): Promise<void> => {
		await fs.mkdir(path.dirname(this.filePath), { recursive: true });
		await fs.writeFile(this.filePath, JSON.stringify(this.toSnapshot()), 'utf8');
	};

	public getFilePath(): string {
		return this.filePath;
	}
}
