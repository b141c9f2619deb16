import { describe, expect, it, vi } from 'vitest';

import { MemoryCollection } from '../../../src/core/rag/memory_collection';
import { normalizeQueryResponse } from '../../../src/core/rag/normalize';
import { VectorIndex } from '../../../src/core/rag/vector_index';
import { EmbeddingUnavailable, InvalidConfiguration, ProviderMismatch } from '../../../src/utils/errors';
import { RecordingCollection, createLogger, disabledEmbedding, markerEmbedding } from '../../helpers/fakes';

const META = [
	{ source: 'product_specs.md', chunk_idx: 0 },
	{ source: 'checkout.html', chunk_idx: 0 },
];

describe('VectorIndex', () => {
	it('passes provider embeddings to the collection on upsert and query', async () => {
		const collection = new RecordingCollection();
		const index = new VectorIndex({ collection, embedding: markerEmbedding(), logger: createLogger() });

		await index.upsert(['a', 'b'], ['discount rules', 'checkout page'], META);
		await index.query('discount', 3);

		expect(collection.upserts).toEqual([
			{
				ids: ['a', 'b'],
				documents: ['discount rules', 'checkout page'],
				metadatas: META,
				embeddings: [
					[1, 0, 0, 0, 0, 0, 0.01],
					[0, 1, 0, 0, 0, 0, 0.01],
				],
			},
		]);
		expect(collection.queries).toEqual([{ queryEmbeddings: [[1, 0, 0, 0, 0, 0, 0.01]], nResults: 3 }]);
	});

	it('stores text only when embeddings are disabled', async () => {
		const collection = new RecordingCollection();
		const index = new VectorIndex({ collection, embedding: disabledEmbedding(), logger: createLogger() });

		await index.upsert(['a'], ['discount rules'], [META[0]]);

		expect(collection.upserts).toEqual([{ ids: ['a'], documents: ['discount rules'], metadatas: [META[0]] }]);
	});

	it('fails queries with EmbeddingUnavailable when neither side can embed', async () => {
		const index = new VectorIndex({ collection: new RecordingCollection(), embedding: disabledEmbedding(), logger: createLogger() });

		await expect(index.query('discount', 5)).rejects.toThrow(EmbeddingUnavailable);
	});

	it('falls back to text queries when the collection embeds on its own', async () => {
		const index = new VectorIndex({ collection: new MemoryCollection('qa_agent'), embedding: disabledEmbedding(), logger: createLogger() });
		await index.upsert(['a', 'b'], ['discount code rules', 'page layout colours'], META);

		const hits = normalizeQueryResponse(await index.query('discount code', 1));

		expect(hits).toHaveLength(1);
		expect(hits[0].document).toBe('discount code rules');
	});

	it('finds an upserted chunk by its own text at a distance of about zero', async () => {
		const index = new VectorIndex({ collection: new MemoryCollection('qa_agent'), embedding: markerEmbedding(), logger: createLogger() });
		await index.upsert(['a', 'b'], ['discount at checkout', 'login with password'], META);

		const [top] = normalizeQueryResponse(await index.query('login with password', 2));

		expect(top.document).toBe('login with password');
		expect(top.distance).toBeCloseTo(0, 10);
	});

	it('rejects embeddings whose dimensionality changes', async () => {
		const embed = vi
			.fn<(texts: string[]) => Promise<number[][]>>()
			.mockResolvedValueOnce([[1, 0]])
			.mockResolvedValueOnce([[1, 0, 0]]);
		const index = new VectorIndex({ collection: new RecordingCollection(), embedding: { embed }, logger: createLogger() });

		await index.upsert(['a'], ['first'], [META[0]]);
		await expect(index.query('second', 1)).rejects.toThrow(ProviderMismatch);
	});

	it('validates its arguments', async () => {
		const index = new VectorIndex({ collection: new RecordingCollection(), embedding: markerEmbedding(), logger: createLogger() });

		await expect(index.upsert(['a', 'b'], ['only one'], META)).rejects.toThrow(InvalidConfiguration);
		await expect(index.query('discount', 0)).rejects.toThrow(InvalidConfiguration);
		await expect(index.query('discount', 1.5)).rejects.toThrow(InvalidConfiguration);
	});

	it('ignores empty upserts', async () => {
		const collection = new RecordingCollection();
		const index = new VectorIndex({ collection, embedding: markerEmbedding(), logger: createLogger() });

		await index.upsert([], [], []);

		expect(collection.upserts).toEqual([]);
	});

	it('flushes collections that persist and only warns when flushing fails', async () => {
		const collection = new RecordingCollection();
		const persist = vi.fn(async () => {
			throw new Error('disk full');
		});
		const logger = createLogger();
		const index = new VectorIndex({ collection: Object.assign(collection, { persist }), embedding: markerEmbedding(), logger });

		await index.upsert(['a'], ['discount'], [META[0]]);

		expect(persist).toHaveBeenCalledTimes(1);
		expect(logger.warn).toHaveBeenCalledWith("[VECTOR_INDEX] Failed to persist 'recording': disk full");
		expect(await index.count()).toBe(1);
	});
});
