import { IHit } from '../../types';

export const isMapping = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Single-query batches come back as `[[a, b, c]]`; unwrap one level in that case.
 */
const flattenOnce = (value: unknown): unknown[] => {
	if (!Array.isArray(value)) return [];
	const first: unknown = value[0];
	return Array.isArray(first) ? first : value;
};

const toDocument = (value: unknown): string => {
	if (typeof value === 'string') return value;
	if (value === null || value === undefined) return '';
	return String(value);
};

const toDistance = (value: unknown): number | null => (typeof value === 'number' && Number.isFinite(value) ? value : null);

/**
 * Turns a collection's query response into hits.
 *
 * Accepts the mapping shape (`documents` / `metadatas` / `distances`), the positional
 * shape (`[documents, metadatas, distances]`) and, failing both, a bare documents list.
 * Sequences are matched by position and may differ in length: a missing metadata entry
 * becomes `{}` and a missing distance `null`. Metadata values are passed through as is.
 */
export const normalizeQueryResponse = (raw: unknown): IHit[] => {
	let documents: unknown;
	let metadatas: unknown;
	let distances: unknown;

	if (isMapping(raw)) {
		documents = raw.documents;
		metadatas = raw.metadatas;
		distances = raw.distances;
	} else if (Array.isArray(raw)) {
		[documents, metadatas, distances] = raw;
	} else {
		documents = raw;
	}

	const docs = flattenOnce(documents);
	const metas = flattenOnce(metadatas);
	const dists = flattenOnce(distances);

	return docs.map((document, i) => ({
		document: toDocument(document),
		metadata: i < metas.length ? metas[i] : {},
		distance: i < dists.length ? toDistance(dists[i]) : null,
	}));
};
