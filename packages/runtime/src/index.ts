export * from './dispatch/dispatchLoop';
export * from './dispatch/replyWith';
export * from './request/replyCorrelator';
export * from './search/searchOrchestrator';
export * from './stream/broadcastChannel';
export * from './stream/eventStreamBridge';
export * from './ingress/ingress';
export * from './resources/lifecycle';
