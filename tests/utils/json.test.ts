import { describe, expect, it } from 'vitest';

import { GenerationParseFailure } from '../../src/utils/errors';
import { extractJsonArray } from '../../src/utils/json';

describe('extractJsonArray', () => {
	it('extracts an array surrounded by prose', () => {
		expect(extractJsonArray('Here you go:\n[{"Test_ID": "TC-001"}]\nLet me know!')).toEqual([{ Test_ID: 'TC-001' }]);
	});

	it('keeps nested arrays inside the outer one', () => {
		expect(extractJsonArray('x [[1, 2], [3]] y')).toEqual([[1, 2], [3]]);
	});

	it('returns the first array that parses when several are present', () => {
		expect(extractJsonArray('first [1] then [2]')).toEqual([1]);
	});

	it('skips bracketed prose that is not JSON', () => {
		expect(extractJsonArray('see [note] then [1, 2]')).toEqual([1, 2]);
	});

	it('fails when there is no bracketed span', () => {
		expect(() => extractJsonArray('{"Test_ID": "TC-001"}')).toThrow('Could not extract a JSON array from generated text: no bracketed array found');
	});

	it('keeps the raw text on the failure', () => {
		let failure: unknown;
		try {
			extractJsonArray('[not json]');
		} catch (error) {
			failure = error;
		}

		expect(failure).toBeInstanceOf(GenerationParseFailure);
		expect(failure).toMatchObject({ code: 'GENERATION_PARSE_FAILURE', raw: '[not json]' });
	});
});
