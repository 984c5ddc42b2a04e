export * from './types.js';
export * from './deployment-orchestrator.js';
