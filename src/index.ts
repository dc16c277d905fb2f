export * from './weather';
export * from './alerts';
export * from './system';
export { createProgram } from './cli';
