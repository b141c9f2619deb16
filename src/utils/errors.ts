export type ErrorCode =
	| 'INVALID_CONFIGURATION'
	| 'EMBEDDING_UNAVAILABLE'
	| 'PROVIDER_MISMATCH'
	| 'INDEX_UNAVAILABLE'
	| 'MALFORMED_METADATA'
	| 'GENERATION_PARSE_FAILURE';

/**
 * Base class for every error the pipeline raises on purpose.
 * Errors coming from the underlying store or SDKs are not wrapped unless noted.
 */
export class QaForgeError extends Error {
	public readonly code: ErrorCode;

	constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

/** Bad chunking, retrieval or environment parameters. */
export class InvalidConfiguration extends QaForgeError {
	constructor(message: string) {
		super('INVALID_CONFIGURATION', message);
	}
}

/** No embedding provider is active and the collection cannot embed on its own. */
export class EmbeddingUnavailable extends QaForgeError {
	constructor(message: string = 'No embedding provider is available') {
		super('EMBEDDING_UNAVAILABLE', message);
	}
}

export class ProviderMismatch extends QaForgeError {
	public readonly expected: number;
	public readonly received: number;

	constructor(expected: number, received: number) {
		super('PROVIDER_MISMATCH', `Embedding dimensionality mismatch: expected ${expected}, received ${received}`);
		this.expected = expected;
		this.received = received;
	}
}

/**
 * The store could not be opened. The message of the cause is kept verbatim.
 */
export class IndexUnavailable extends QaForgeError {
	constructor(cause: unknown) {
		super('INDEX_UNAVAILABLE', cause instanceof Error ? cause.message : String(cause), { cause });
	}
}

export class MalformedMetadata extends QaForgeError {
	public readonly metadata: unknown;

	constructor(metadata: unknown) {
		super('MALFORMED_METADATA', `Metadata is not a mapping: ${String(metadata)}`);
		this.metadata = metadata;
	}
}

export class GenerationParseFailure extends QaForgeError {
	public readonly raw: string;

	constructor(raw: string, reason: string) {
		super('GENERATION_PARSE_FAILURE', `Could not extract a JSON array from generated text: ${reason}`);
		this.raw = raw;
	}
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
