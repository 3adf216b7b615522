export * from './logger/index.js';
export * from './env.js';
export * from './conversation/index.js';
export * from './brain/llm/services/types.js';
export { DashScopeApplicationService } from './brain/llm/services/dashscope.js';
export type { DashScopeApplicationConfig, FetchLike } from './brain/llm/services/dashscope.js';

// Storage modules with namespace disambiguation
export * as Storage from './storage/index.js';
