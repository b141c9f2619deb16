/**
 * Lexical vectorizer for collections that embed on their own.
 *
 * Terms are hashed into a fixed number of buckets and weighted by term frequency, so
 * vectors need no corpus statistics and stay comparable as records are added.
 */

export const LEXICAL_DIMENSIONS = 512;

/**
 * Tokenize text into lowercase words
 */
export function tokenize(text: string): string[] {
	return text
		.toLowerCase()
		.replace(/[^\w\s$%]/g, ' ') // keep $ and % for prices and discounts
		.split(/\s+/)
		.filter((word) => word.length > 0);
}

/**
 * 32-bit FNV-1a
 */
function hashTerm(term: string): number {
	let hash = 0x811c9dc5;
	for (let i = 0; i < term.length; i++) {
		hash ^= term.charCodeAt(i);
		hash = Math.imul(hash, 0x01000193);
	}
	return hash >>> 0;
}

/**
 * Hashed term-frequency vector, L2-normalized. Empty text yields the zero vector.
 */
export function lexicalVector(text: string, dimensions: number = LEXICAL_DIMENSIONS): number[] {
	const vector = new Array<number>(dimensions).fill(0);
	for (const token of tokenize(text)) {
		vector[hashTerm(token) % dimensions] += 1;
	}

	const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
	return norm === 0 ? vector : vector.map((value) => value / norm);
}

/**
 * Calculate cosine similarity between two dense vectors
 */
export function cosineSimilarity(vec1: number[], vec2: number[]): number {
	let dotProduct = 0;
	let norm1 = 0;
	let norm2 = 0;

	for (let i = 0; i < vec1.length; i++) {
		dotProduct += vec1[i] * (vec2[i] ?? 0);
		norm1 += vec1[i] * vec1[i];
	}
	for (const value of vec2) {
		norm2 += value * value;
	}

	// Handle zero vectors
	if (norm1 === 0 || norm2 === 0) {
		return 0;
	}

	return dotProduct / (Math.sqrt(norm1) * Math.sqrt(norm2));
}

/**
 * Cosine distance, clamped to [0, 2]
 */
export function cosineDistance(vec1: number[], vec2: number[]): number {
	return Math.max(0, 1 - cosineSimilarity(vec1, vec2));
}
