export * from './config/env';
export * from './integrations';
export * from './services';
