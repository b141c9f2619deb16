export * from './synthesizer';
export * from './agent';
export * from './prompts';
