// Configuration loading logic
import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { existsSync } from 'fs';
import { ProjectConfig } from '../types/index.js';
import { ConfigLoader, ConfigValidationResult, RawConfig } from './types.js';
import { validateAndNormalizeConfig, validateConfig } from './validator.js';
import { deepMerge, isPlainObject } from '../utils/objects.js';

export const DEFAULT_CONFIG_PATHS = ['./stacks.yml', './stacks.yaml', './stacks.json'];

/**
 * Configuration loader that supports YAML and JSON project files with environment variable substitution
 */
export class ProjectConfigLoader implements ConfigLoader {

  /**
   * Load and parse a project file
   * @param path - Path to the project file (YAML or JSON)
   * @returns Promise resolving to validated and normalized ProjectConfig
   */
  async load(path: string): Promise<ProjectConfig> {
    try {
      if (!existsSync(path)) {
        throw new Error(`Configuration file not found: ${path}`);
      }

      const content = await readFile(path, 'utf-8');

      let rawConfig: unknown;
      if (path.endsWith('.json')) {
        rawConfig = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        rawConfig = parseYaml(content);
      } else {
        throw new Error(`Unsupported file format. Only .json, .yml, and .yaml files are supported.`);
      }

      if (!isPlainObject(rawConfig)) {
        throw new Error('Configuration file must contain a mapping at the top level');
      }

      const configWithEnvVars = this.resolveEnvironmentVariables(rawConfig);
      const mergedConfig = this.applyDefaults(isPlainObject(configWithEnvVars) ? configWithEnvVars : {});

      return validateAndNormalizeConfig(mergedConfig);
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to load configuration from ${path}: ${error.message}`);
      }
      throw new Error(`Failed to load configuration from ${path}: ${String(error)}`);
    }
  }

  /**
   * Validate configuration without loading from file
   */
  validate(config: unknown): ConfigValidationResult {
    return validateConfig(config);
  }

  /**
   * Load configuration from the first of several possible locations
   * @param searchPaths - Paths to try, in order
   */
  async loadFromPaths(searchPaths: string[]): Promise<{ path: string; config: ProjectConfig }> {
    const errors: string[] = [];

    for (const path of searchPaths) {
      try {
        return { path, config: await this.load(path) };
      } catch (error) {
        errors.push(`${path}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    throw new Error(`Could not load configuration from any of the specified paths:\n${errors.join('\n')}`);
  }

  /**
   * Recursively resolve environment variables in a configuration value
   * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax
   */
  private resolveEnvironmentVariables(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.substituteEnvironmentVariables(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => this.resolveEnvironmentVariables(item));
    }

    if (isPlainObject(value)) {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.resolveEnvironmentVariables(entry);
      }
      return result;
    }

    return value;
  }

  /**
   * Substitute environment variables in a string. Placeholders without a value
   * or default (including ${stack:name} references) are kept as written.
   */
  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match: string, varExpression: string) => {
      const [varName, defaultValue] = varExpression.split(':-');
      const envValue = process.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      return match;
    });
  }

  private applyDefaults(config: RawConfig): RawConfig {
    const defaults: RawConfig = {
      aws: {
        region: 'us-east-1'
      },
      settings: {
        state_file: '.stackctl/state.json',
        poll_interval_seconds: 10,
        timeout_minutes: 30
      }
    };

    return deepMerge(defaults, config);
  }
}

/**
 * Convenience function to create a new configuration loader
 */
export function createConfigLoader(): ProjectConfigLoader {
  return new ProjectConfigLoader();
}

/**
 * Load configuration from standard locations
 * Searches for stacks.yml, stacks.yaml, stacks.json in the current directory
 */
export async function loadDefaultConfig(): Promise<{ path: string; config: ProjectConfig }> {
  return createConfigLoader().loadFromPaths(DEFAULT_CONFIG_PATHS);
}
