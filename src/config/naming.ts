import { ProjectConfig, StageConfig } from '../types/index.js';
import { StackctlError } from '../errors/index.js';

/**
 * Configuration for stack naming
 */
export interface NamingConfig {
  /** Stage name from configuration */
  stageName: string;
  /** Custom prefix for all stacks */
  prefix?: string;
}

const STACK_REFERENCE_PATTERN = /\$\{stack:([^}]+)\}/g;

/**
 * Stack naming utility class
 */
export class StackNamingService {
  private readonly maxStackNameLength = 128;

  /**
   * Generate the stack name of every stage, keyed by stage name
   * @param config - Project configuration
   * @returns Map from stage name to CloudFormation stack name
   */
  generateStackNames(config: ProjectConfig): Map<string, string> {
    const names = new Map<string, string>();

    for (const stage of config.stages) {
      names.set(stage.name, this.generateStackName({
        stageName: stage.name,
        prefix: config.settings.stack_prefix
      }));
    }

    return names;
  }

  /**
   * Replace ${stack:<stage>} references in a stage's parameters with stack names
   * @param stage - Stage whose parameters are resolved
   * @param stackNames - Stack names generated by generateStackNames
   * @throws StackctlError when a reference names an unknown stage
   */
  resolveStackReferences(stage: StageConfig, stackNames: Map<string, string>): Record<string, string> {
    const resolved: Record<string, string> = {};

    for (const [key, value] of Object.entries(stage.parameters ?? {})) {
      resolved[key] = value.replace(STACK_REFERENCE_PATTERN, (_match: string, stageName: string) => {
        const stackName = stackNames.get(stageName);
        if (!stackName) {
          throw new StackctlError(
            'UNKNOWN_STAGE',
            `Parameter ${key} of stage ${stage.name} references unknown stage ${stageName}`,
            { stage: stage.name }
          );
        }
        return stackName;
      });
    }

    return resolved;
  }

  /**
   * Stack prefix derived from a project name, which may contain underscores or start with a digit
   */
  toStackPrefix(projectName: string): string {
    return this.sanitizeName(projectName);
  }

  generateStackName(config: NamingConfig): string {
    const parts = [config.prefix, config.stageName].filter(Boolean);
    const name = this.sanitizeName(parts.join('-'));
    return this.validateAndTruncate(name, this.maxStackNameLength);
  }

  /**
   * Sanitize name to be a valid stack name
   * - Remove invalid characters
   * - Ensure it starts with a letter
   * - Replace consecutive hyphens with single hyphen
   */
  private sanitizeName(name: string): string {
    let sanitized = name.replace(/[^a-zA-Z0-9-]/g, '-');
    sanitized = sanitized.replace(/-+/g, '-');
    sanitized = sanitized.replace(/^-+|-+$/g, '');

    if (sanitized && !/^[a-zA-Z]/.test(sanitized)) {
      sanitized = 'stack-' + sanitized;
    }

    if (!sanitized) {
      sanitized = 'stack';
    }

    return sanitized;
  }

  /**
   * Truncate name to fit the stack name limit, keeping a hash of the full name
   */
  private validateAndTruncate(name: string, maxLength: number): string {
    if (name.length <= maxLength) {
      return name;
    }

    const hash = this.generateShortHash(name);
    const truncatedLength = maxLength - hash.length - 1;
    return name.substring(0, truncatedLength) + '-' + hash;
  }

  private generateShortHash(input: string): string {
    let hash = 0;
    for (let i = 0; i < input.length; i++) {
      const char = input.charCodeAt(i);
      hash = ((hash << 5) - hash) + char;
      hash = hash & hash; // 32-bit
    }
    return Math.abs(hash).toString(36).substring(0, 6);
  }
}

/**
 * Convenience function to create a new stack naming service
 */
export function createNamingService(): StackNamingService {
  return new StackNamingService();
}
