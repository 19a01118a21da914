export * from './lifecycle';
export * from './subjects';
export * from './errors';
export * from './codec';
export * from './envelopes';
export * from './ports';
export * from './config/defaults';
export * from './config/types';
export * from './utils/ids';
export * from './utils/timeout';
export * from './utils/retry';
