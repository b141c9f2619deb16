export * from './rag';
export * from './qa';
export * from './logger';
export * from './config';
export * from './commands';
