/**
 * System Module
 *
 * Infrastructure shared by the weather alert pipeline: configuration,
 * logging, error handling, scheduling, notifications and monitoring.
 */

export * from './logger';
export * from './scheduler';
export * from './error-handling';
export * from './monitoring';
export * from './notification';
export * from './config';
export * from './system';
