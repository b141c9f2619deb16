export * from './llm';
export * from './embedding';
