export * from './types.js';
export * from './history.js';
export * from './formatter.js';
export * from './chunker.js';
export * from './chat-lock.js';
export * from './context-store.js';
export * from './messages.js';
export * from './orchestrator.js';
