export * from './failureClassifier.js';
export * from './recoveryDetector.js';
export * from './runOrchestrator.js';
export * from './monitorCycle.js';
