// Stock analyzer module index

export * from './graph';
export * from './state';
export * from './services';
export * from './prompts';
export * from './nodes';
