export * from './config.js';
export * from './conversation.js';
export * from './error.js';
export * from './event.js';
export * from './request.js';
export * from './result.js';
