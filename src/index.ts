export * from './lib/num/index.js';
export { resolveRuntime, getRuntime, resetRuntimeCache } from './config/runtime.js';
export type { Runtime } from './config/runtime.js';
export { createLogger } from './log.js';
