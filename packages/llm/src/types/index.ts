export * from './config.js';
export * from './content.js';
export * from './error.js';
export * from './event.js';
export * from './message.js';
export * from './provider.js';
export * from './request.js';
export * from './tool.js';
