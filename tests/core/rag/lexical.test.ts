import { describe, expect, it } from 'vitest';

import { LEXICAL_DIMENSIONS, cosineDistance, cosineSimilarity, lexicalVector, tokenize } from '../../../src/core/rag/lexical';

describe('tokenize', () => {
	it('lowercases, splits on punctuation and keeps prices and percentages', () => {
		expect(tokenize('Save 15% on $110, now!')).toEqual(['save', '15%', 'on', '$110', 'now']);
	});

	it('returns nothing for blank text', () => {
		expect(tokenize('  \n ')).toEqual([]);
	});
});

describe('lexicalVector', () => {
	it('yields the zero vector for empty text', () => {
		const vector = lexicalVector('');
		expect(vector).toHaveLength(LEXICAL_DIMENSIONS);
		expect(vector.every((value) => value === 0)).toBe(true);
	});

	it('is unit length', () => {
		const vector = lexicalVector('apply the discount code at checkout');
		const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
		expect(norm).toBeCloseTo(1, 10);
	});

	it('ignores letter case and punctuation', () => {
		expect(lexicalVector('Discount, CODE!')).toEqual(lexicalVector('discount code'));
	});

	it('ranks texts sharing terms closer than unrelated ones', () => {
		const query = lexicalVector('discount code');
		expect(cosineDistance(query, lexicalVector('enter the discount code'))).toBeLessThan(cosineDistance(query, lexicalVector('reset your password')));
	});
});

describe('cosine helpers', () => {
	it('measures orthogonal and opposite vectors', () => {
		expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
		expect(cosineDistance([1, 0], [-1, 0])).toBe(2);
	});

	it('treats zero vectors as unrelated', () => {
		expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
		expect(cosineDistance([0, 0], [1, 1])).toBe(1);
	});

	it('gives identical vectors a distance of about zero', () => {
		expect(cosineDistance([0.3, 0.4, 0.5], [0.3, 0.4, 0.5])).toBeCloseTo(0, 10);
	});
});
