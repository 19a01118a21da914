export * from './ingestion';
export * from './generation';
export * from './search';
