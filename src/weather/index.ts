export * from './types';
export * from './forecast-parser';
export * from './condition-analyzer';
export * from './weather-client';
export * from './weather-service';
