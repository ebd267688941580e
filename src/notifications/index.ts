export * from './emailTransport.js';
export * from './emailTemplates.js';
export * from './failureNotifier.js';
