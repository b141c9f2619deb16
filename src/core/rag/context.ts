import { IContextBundle, IHit, ILogger } from '../../types';
import { MalformedMetadata } from '../../utils/errors';
import { isMapping } from './normalize';

export const UNKNOWN_SOURCE = 'unknown';

const isEmptyValue = (value: unknown): boolean => {
	if (value === null || value === undefined || value === '' || value === 0 || value === false) return true;
	if (Array.isArray(value)) return value.length === 0;
	if (isMapping(value)) return Object.keys(value).length === 0;
	return false;
};

const describeValue = (value: unknown): string => {
	if (typeof value === 'string') return value;
	if (typeof value !== 'object' || value === null) return String(value);
	try {
		return JSON.stringify(value);
	} catch {
		return String(value);
	}
};

/**
 * Display source for a hit: the metadata's `source` field when the metadata is a
 * mapping that carries one, otherwise the metadata itself as text, otherwise `"unknown"`.
 */
export const resolveSource = (metadata: unknown): string => {
	if (isMapping(metadata) && metadata.source !== null && metadata.source !== undefined) {
		return describeValue(metadata.source);
	}
	return isEmptyValue(metadata) ? UNKNOWN_SOURCE : describeValue(metadata);
};

/**
 * Concatenates hits into one grounding block and lists their sources,
 * deduplicated in first-seen order.
 */
export const buildContext = (hits: IHit[], logger?: ILogger): IContextBundle => {
	let context = '';
	const sources: string[] = [];

	for (const hit of hits) {
		if (!isMapping(hit.metadata) && !isEmptyValue(hit.metadata)) {
			logger?.debug(`[CONTEXT] ${new MalformedMetadata(hit.metadata).message}`);
		}
		const source = resolveSource(hit.metadata);
		context += `\n---\nSource: ${source}\n${hit.document}\n`;
		sources.push(source);
	}

	return { context, sources: [...new Set(sources)] };
};
