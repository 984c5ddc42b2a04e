export * from './types.js';
export * from './cloudformation-generator.js';
export * from './template-engine.js';
export * from './template-store.js';
export * from './template-analyzer.js';
export * from './cfn-yaml.js';
