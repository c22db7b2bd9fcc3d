export * from './model';
export * from './destination';
export * from './errors';
export * from './existence';
export * from './http';
export * from './config';
export * from './summary';
export * from './orchestrator';
export * from './transfer-worker';
export * from './sources/version-source';
export * from './sources/remote-listing';
export * from './sources/local-scan';
export * from './sources/version-query';
export * from './stores/object-store';
export * from './stores/s3-store';
export { runSync, SyncDependencies, RunSyncOptions } from './commands/sync';
export { contentHash } from './util/files';
