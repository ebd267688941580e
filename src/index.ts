/**
 * Task Failure Monitor – library entry point
 *
 * Re-exports the building blocks of a monitor run so that another scheduler
 * or host can assemble its own cycle.
 *
 * @module task-failure-monitor
 */

export * from './types/index.js';
export * from './time/wallClock.js';
export * from './logging/index.js';
export * from './history/index.js';
export * from './monitor/index.js';
export * from './sources/index.js';
export * from './notifications/index.js';
export * from './config/monitorConfig.js';
