import { GenerationParseFailure, errorMessage } from './errors';

const positionsOf = (text: string, char: string): number[] => {
	const positions: number[] = [];
	for (let i = text.indexOf(char); i !== -1; i = text.indexOf(char, i + 1)) {
		positions.push(i);
	}
	return positions;
};

/**
 * Pulls the first JSON array literal out of free-form model output.
 *
 * Candidates are tried from the earliest `[`, and for each opening bracket from the
 * widest span down, so a response holding one array (possibly with nested ones)
 * resolves to that whole array, and a response holding several resolves to the first
 * one that parses.
 *
 * @throws {GenerationParseFailure} When no bracketed span parses as a JSON array
 */
export const extractJsonArray = (raw: string): unknown[] => {
	const openings = positionsOf(raw, '[');
	const closings = positionsOf(raw, ']');

	if (openings.length === 0 || closings.length === 0) {
		throw new GenerationParseFailure(raw, 'no bracketed array found');
	}

	let lastError = 'no candidate span';
	for (const start of openings) {
		for (let i = closings.length - 1; i >= 0 && closings[i] > start; i--) {
			try {
				const parsed: unknown = JSON.parse(raw.slice(start, closings[i] + 1));
				if (Array.isArray(parsed)) {
					return parsed;
				}
			} catch (error) {
				lastError = errorMessage(error);
			}
		}
	}

	throw new GenerationParseFailure(raw, lastError);
};
