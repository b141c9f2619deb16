export { chunkText, chunkDocument, DEFAULT_CHUNK_SIZE, DEFAULT_CHUNK_OVERLAP } from './chunker';
export { readDocument, htmlToText } from './reader';
export { tokenize, lexicalVector, cosineSimilarity, cosineDistance, LEXICAL_DIMENSIONS } from './lexical';
export { MemoryCollection, PersistentMemoryCollection } from './memory_collection';
export { VectorIndex, type IEmbedder, type IVectorIndexOptions } from './vector_index';
export { normalizeQueryResponse, isMapping } from './normalize';
export { KnowledgeBase, DEFAULT_RESULTS } from './knowledge_base';
export { buildContext, resolveSource, UNKNOWN_SOURCE } from './context';
export { Ingestor, type IIngestorOptions } from './ingest';
