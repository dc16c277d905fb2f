export * from './alert-system';
export * from './deduplicator';
