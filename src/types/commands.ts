import type { Embedding } from '../core/ai/embedding';
import type { QaAgent } from '../core/qa/agent';
import type { Ingestor } from '../core/rag/ingest';
import type { KnowledgeBase } from '../core/rag/knowledge_base';
import type { VectorIndex } from '../core/rag/vector_index';
import type { ISettings } from './config';
import type { ILogger } from './logger';

/**
 * Fully wired pipeline, built once per process.
 */
export interface IApp {
	settings: ISettings;
	logger: ILogger;
	embedding: Embedding;
	index: VectorIndex;
	knowledgeBase: KnowledgeBase;
	ingestor: Ingestor;
	agent: QaAgent;
	close(): Promise<void>;
}

export interface ICommandContext {
	logger: ILogger;
	commands: ReadonlyMap<string, ICommand>;
	/** Builds the pipeline on first use; `help` never pays for it. */
	getApp(): Promise<IApp>;
}

export interface ICommand {
	name: string;
	description: string;
	usage: string;
	/** Resolves to the text printed on stdout */
	execute: (context: ICommandContext, args: string[]) => Promise<string>;
}
