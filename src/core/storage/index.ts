export * from './config.js';
export * from './constants.js';
export * from './factory.js';
export * from './backend/index.js';
