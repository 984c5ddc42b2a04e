import { dump as dumpYaml } from 'js-yaml';
import { CloudFormationGenerator } from './cloudformation-generator.js';
import { CloudFormationTemplate, GeneratorContext, TemplateGenerator } from './types.js';
import { BuiltinTemplateKind } from '../types/index.js';
import { StackctlError } from '../errors/index.js';

export type TemplateFormat = 'json' | 'yaml';

export interface TemplateOptions {
  format?: TemplateFormat;
  minify?: boolean;
}

export class TemplateEngine {
  constructor(private readonly generator: TemplateGenerator = new CloudFormationGenerator()) {}

  generateTemplate(kind: BuiltinTemplateKind, context: GeneratorContext): CloudFormationTemplate {
    const template = this.generator.generate(kind, context);
    this.validateTemplate(template);
    return template;
  }

  /**
   * Structural checks CloudFormation would otherwise reject at create time
   * @throws StackctlError describing the first problem found
   */
  validateTemplate(template: CloudFormationTemplate): void {
    if (!template.AWSTemplateFormatVersion) {
      throw new StackctlError('TEMPLATE_INVALID', 'CloudFormation template validation failed: Missing AWSTemplateFormatVersion');
    }

    if (Object.keys(template.Resources).length === 0) {
      throw new StackctlError('TEMPLATE_INVALID', 'CloudFormation template validation failed: Template must contain at least one resource');
    }

    for (const [resourceName, resource] of Object.entries(template.Resources)) {
      if (!resource.Type) {
        throw new StackctlError('TEMPLATE_INVALID', `CloudFormation template validation failed: Resource ${resourceName} missing Type property`);
      }
    }
  }

  render(template: object, options: TemplateOptions = {}): string {
    if (options.format === 'yaml') {
      return dumpYaml(template, { noRefs: true, lineWidth: 120, skipInvalid: true });
    }
    return options.minify ? JSON.stringify(template) : JSON.stringify(template, null, 2);
  }
}
