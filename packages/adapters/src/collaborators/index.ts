export * from './pageExtractor';
export * from './embeddingModel';
export * from './textGenerator';
export * from './graphStore';
export * from './vectorStore';
