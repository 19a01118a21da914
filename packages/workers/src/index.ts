export * from './worker';
export * from './segmentation';
export * from './perception';
export * from './preprocessing';
export * from './knowledgeGraph';
export * from './vectorMemory';
export * from './textGeneration';
