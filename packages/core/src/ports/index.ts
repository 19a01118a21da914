export * from './bus';
export * from './logger';
export * from './collaborators';
