export * from './app';
export * from './middleware';
export * from './server';
export * from './sse-stream';
