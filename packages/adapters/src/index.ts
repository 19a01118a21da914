export * from './bus/memory';
export * from './bus/nats';
export * from './bus/subjectMatch';
export * from './logger/pino';
export * from './logger/fake';
export * from './collaborators';
