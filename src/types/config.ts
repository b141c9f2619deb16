export interface ISettings {
	ingest: {
		chunk_size: number;
		chunk_overlap: number;
	};
	retrieval: {
		top_k: number;
		default_results: number;
	};
	generation: {
		fallback_path: string;
		max_tokens: number;
		temperature: number;
	};
}

export interface IEnvironment {
	OPENAI_API_KEY?: string;
	OPENAI_BASE_URL: string;
	OPENAI_MODEL: string;
	OPENAI_EMBEDDING_MODEL: string;
	LOCAL_EMBEDDING_MODEL: string;
	POSTGRES_URI?: string;
	VECTOR_STORE_PATH: string;
	COLLECTION_NAME: string;
	DEBUG_MODE: boolean;
	LOG_TO_FILE: boolean;
	QA_FORGE_CONFIG?: string;
}
