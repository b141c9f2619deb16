import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { Ingestor } from '../../../src/core/rag/ingest';
import { InvalidConfiguration } from '../../../src/utils/errors';
import { VectorIndex } from '../../../src/core/rag/vector_index';
import { RecordingCollection, createLogger, markerEmbedding, words } from '../../helpers/fakes';

const setup = () => {
	const collection = new RecordingCollection();
	const logger = createLogger();
	const index = new VectorIndex({ collection, embedding: markerEmbedding(), logger });
	return { collection, logger, ingestor: new Ingestor({ index, logger, chunking: { chunkSize: 10, overlap: 3 } }) };
};

describe('Ingestor', () => {
	let directory: string;

	beforeEach(async () => {
		directory = await fs.mkdtemp(path.join(os.tmpdir(), 'qa-forge-ingest-'));
	});

	afterEach(async () => {
		await fs.rm(directory, { recursive: true, force: true });
	});

	it('upserts every chunk of every document in one batch', async () => {
		const { collection, ingestor } = setup();

		const count = await ingestor.ingestDocuments([
			{ filename: 'a.md', text: words(25) },
			{ filename: 'b.txt', text: 'short' },
		]);

		expect(count).toBe(5);
		expect(collection.upserts).toHaveLength(1);
		expect(collection.upserts[0].ids).toEqual(['a.md_0', 'a.md_1', 'a.md_2', 'a.md_3', 'b.txt_0']);
		expect(collection.upserts[0].metadatas[3]).toEqual({ source: 'a.md', chunk_idx: 3 });
	});

	it('warns and stores nothing when the documents are empty', async () => {
		const { collection, logger, ingestor } = setup();

		expect(await ingestor.ingestDocuments([{ filename: 'empty.md', text: '  ' }])).toBe(0);
		expect(collection.upserts).toEqual([]);
		expect(logger.warn).toHaveBeenCalledWith('[INGEST] Nothing to ingest');
	});

	it('reads files by extension before chunking', async () => {
		const { collection, ingestor } = setup();
		const filePath = path.join(directory, 'checkout.html');
		await fs.writeFile(filePath, '<p>Discount code</p><script>ignored()</script>');

		expect(await ingestor.ingestFiles([filePath])).toBe(1);
		expect(collection.upserts[0].documents).toEqual(['Discount code']);
	});

	it('propagates read failures without storing anything', async () => {
		const { collection, ingestor } = setup();

		await expect(ingestor.ingestFiles([path.join(directory, 'missing.md')])).rejects.toThrow(/ENOENT/);
		expect(collection.upserts).toEqual([]);
	});

	it('rejects documents that share a filename', async () => {
		const { collection, ingestor } = setup();

		const ingesting = ingestor.ingestDocuments([
			{ filename: 'notes.md', text: 'first' },
			{ filename: 'guide.md', text: 'second' },
			{ filename: 'notes.md', text: 'third' },
		]);

		await expect(ingesting).rejects.toThrow(InvalidConfiguration);
		await expect(ingesting).rejects.toThrow('Documents share a filename: notes.md');
		expect(collection.upserts).toEqual([]);
	});

	it('rejects files from different directories with the same name before reading them', async () => {
		const { collection, ingestor } = setup();
		const first = path.join(directory, 'a', 'notes.md');
		const second = path.join(directory, 'b', 'notes.md');
		await fs.mkdir(path.dirname(first));
		await fs.writeFile(first, 'Checkout accepts discount codes');

		await expect(ingestor.ingestFiles([first, second])).rejects.toThrow(
			`Files share a name and would produce the same chunk ids: 'notes.md' (${first}, ${second})`
		);
		expect(collection.upserts).toEqual([]);
	});
});
