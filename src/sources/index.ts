export * from './taskSource.js';
export * from './taskMapping.js';
export * from './qrsTaskSource.js';
