// src/index.ts
// Library entry: the collection engine without the CLIs.

export * from './signal';
export * from './repo';
export * from './errors';
export * from './logger';
export { SourceRegistry, type RegistrationResult } from './SourceRegistry';
export * from './Collector';
export * from './checkpoint';
export * from './input';
export * from './ResultStore';
export * from './SignalWriter';
export * from './Scorer';
export * from './ShardWorker';
export * from './WorkLoop';
export * from './config';
export * from './api';
export * from './sources';
