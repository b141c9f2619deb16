import { IChunk, IChunkingOptions } from '../../types';
import { InvalidConfiguration } from '../../utils/errors';

export const DEFAULT_CHUNK_SIZE = 800;
export const DEFAULT_CHUNK_OVERLAP = 100;

const validateWindow = (chunkSize: number, overlap: number): number => {
	if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
		throw new InvalidConfiguration(`chunkSize must be a positive integer, got ${chunkSize}`);
	}
	if (!Number.isInteger(overlap) || overlap < 0) {
		throw new InvalidConfiguration(`overlap must be a non-negative integer, got ${overlap}`);
	}
	if (overlap >= chunkSize) {
		throw new InvalidConfiguration(`overlap (${overlap}) must be smaller than chunkSize (${chunkSize})`);
	}
	return chunkSize - overlap;
};

/**
 * Splits text into overlapping windows of whitespace-delimited tokens.
 *
 * Window `i` starts at token `i * (chunkSize - overlap)`. A window is only opened while
 * it would add tokens beyond the previous window's overlap, so the last window ends
 * exactly at the final token and no window consists solely of overlap.
 *
 * @throws {InvalidConfiguration} When `overlap >= chunkSize` or either value is not a valid count
 */
export const chunkText = (text: string, chunkSize: number = DEFAULT_CHUNK_SIZE, overlap: number = DEFAULT_CHUNK_OVERLAP): string[] => {
	const stride = validateWindow(chunkSize, overlap);
	const tokens = text.split(/\s+/).filter(Boolean);
	const chunks: string[] = [];

	for (let start = 0; start < tokens.length; start += stride) {
		if (start > 0 && start + overlap >= tokens.length) break;
		chunks.push(tokens.slice(start, start + chunkSize).join(' '));
	}

	return chunks;
};

/**
 * Chunks a document and assigns each chunk its `<filename>_<index>` identity
 */
export const chunkDocument = (filename: string, text: string, options: IChunkingOptions = {}): IChunk[] => {
	return chunkText(text, options.chunkSize, options.overlap).map((chunk, index) => ({
		id: `${filename}_${index}`,
		source: filename,
		index,
		text: chunk,
	}));
};
