// Main entry point for stackctl
export * from './types/index.js';
export * from './errors/index.js';
export * from './logging/index.js';
export * from './config/index.js';
export * from './templates/index.js';
export * from './resolver/dependency-graph.js';
export * from './resolver/stage-resolver.js';
export * from './executor/types.js';
export * from './executor/stack-executor.js';
export * from './state/state-tracker.js';
export * from './diagnostics/types.js';
export * from './diagnostics/classifier.js';
export * from './lint/cidr.js';
export * from './lint/project-linter.js';
export * from './companion/verifier.js';
export * from './orchestration/index.js';
export type { LintOptions } from './orchestration/index.js';
