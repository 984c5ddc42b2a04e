// Configuration-specific types
import type { ProjectConfig } from '../types/index.js';

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ConfigLoader {
  load(path: string): Promise<ProjectConfig>;
  validate(config: unknown): ConfigValidationResult;
}

export type RawConfig = Record<string, unknown>;
