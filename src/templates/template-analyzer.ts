import { CloudFormationTemplate, TemplateParameter, TemplateResource, TemplateOutput } from './types.js';
import { ResourceDeclaration } from '../types/index.js';
import { StackctlError } from '../errors/index.js';
import { isPlainObject } from '../utils/objects.js';
import { buildGraph, detectCycle } from '../resolver/dependency-graph.js';

export interface AnalysisContext {
  stackName: string;
  region?: string;
  /** Parameter overrides; template defaults fill the rest */
  parameters: Record<string, string>;
}

export interface TemplateAnalysis {
  parameters: Record<string, string | undefined>;
  resources: ResourceDeclaration[];
  exports: string[];
  imports: string[];
  /** Intra-template reference problems */
  errors: string[];
  /** Export or import names that could not be evaluated statically */
  warnings: string[];
}

const PSEUDO_PARAMETER = /^AWS::/;
const SUB_PLACEHOLDER = /\$\{([^}!][^}]*)\}/g;

function parseDependsOn(value: unknown): string | string[] | undefined | null {
  if (value === undefined || typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    const items = value.filter((item): item is string => typeof item === 'string');
    return items.length === value.length ? items : null;
  }
  return null;
}

/**
 * Narrow an untyped document (parsed YAML or JSON) to a CloudFormation template.
 * @throws StackctlError when the document is not shaped like a template
 */
export function toTemplateDocument(value: unknown, source: string): CloudFormationTemplate {
  const invalid = (message: string) =>
    new StackctlError('TEMPLATE_INVALID', `Template ${source} is invalid: ${message}`);

  if (!isPlainObject(value)) {
    throw invalid('expected a mapping at the top level');
  }

  if (!isPlainObject(value.Resources) || Object.keys(value.Resources).length === 0) {
    throw invalid('Template must contain at least one resource');
  }

  const resources: Record<string, TemplateResource> = {};
  for (const [logicalId, entry] of Object.entries(value.Resources)) {
    if (!isPlainObject(entry) || typeof entry.Type !== 'string') {
      throw invalid(`Resource ${logicalId} missing Type property`);
    }
    const dependsOn = parseDependsOn(entry.DependsOn);
    if (dependsOn === null) {
      throw invalid(`Resource ${logicalId} has a malformed DependsOn`);
    }
    resources[logicalId] = {
      Type: entry.Type,
      Properties: isPlainObject(entry.Properties) ? entry.Properties : undefined,
      DependsOn: dependsOn,
      Condition: typeof entry.Condition === 'string' ? entry.Condition : undefined,
      DeletionPolicy: typeof entry.DeletionPolicy === 'string' ? entry.DeletionPolicy : undefined
    };
  }

  const parameters: Record<string, TemplateParameter> = {};
  if (isPlainObject(value.Parameters)) {
    for (const [name, entry] of Object.entries(value.Parameters)) {
      if (!isPlainObject(entry) || typeof entry.Type !== 'string') {
        throw invalid(`Parameter ${name} missing Type property`);
      }
      const defaultValue = entry.Default;
      parameters[name] = {
        Type: entry.Type,
        Default: typeof defaultValue === 'string' || typeof defaultValue === 'number' ? defaultValue : undefined,
        Description: typeof entry.Description === 'string' ? entry.Description : undefined,
        NoEcho: entry.NoEcho === true || entry.NoEcho === 'true' ? true : undefined
      };
    }
  }

  const outputs: Record<string, TemplateOutput> = {};
  if (isPlainObject(value.Outputs)) {
    for (const [name, entry] of Object.entries(value.Outputs)) {
      if (!isPlainObject(entry) || !('Value' in entry)) {
        throw invalid(`Output ${name} missing Value`);
      }
      outputs[name] = {
        Description: typeof entry.Description === 'string' ? entry.Description : undefined,
        Value: entry.Value,
        Export: isPlainObject(entry.Export) && 'Name' in entry.Export ? { Name: entry.Export.Name } : undefined
      };
    }
  }

  return {
    AWSTemplateFormatVersion: typeof value.AWSTemplateFormatVersion === 'string'
      ? value.AWSTemplateFormatVersion
      : '2010-09-09',
    Description: typeof value.Description === 'string' ? value.Description : undefined,
    Parameters: parameters,
    Conditions: isPlainObject(value.Conditions) ? value.Conditions : undefined,
    Mappings: isPlainObject(value.Mappings) ? value.Mappings : undefined,
    Resources: resources,
    Outputs: outputs
  };
}

/**
 * Effective parameter values: overrides first, then template defaults.
 */
export function effectiveParameters(
  template: CloudFormationTemplate,
  overrides: Record<string, string>
): Record<string, string | undefined> {
  const values: Record<string, string | undefined> = {};
  for (const [name, parameter] of Object.entries(template.Parameters ?? {})) {
    values[name] = overrides[name] ?? (parameter.Default !== undefined ? String(parameter.Default) : undefined);
  }
  return values;
}

/**
 * Evaluate an export/import name expression. Returns undefined when the value
 * depends on something only known at deploy time.
 */
export function evaluateName(
  expression: unknown,
  variables: Record<string, string | undefined>
): string | undefined {
  if (typeof expression === 'string') {
    return expression;
  }
  if (!isPlainObject(expression)) {
    return undefined;
  }

  if (typeof expression.Ref === 'string') {
    return variables[expression.Ref];
  }

  const sub = expression['Fn::Sub'];
  if (sub !== undefined) {
    let template: unknown = sub;
    let scope = variables;
    if (Array.isArray(sub)) {
      const [text, localVariables] = sub;
      template = text;
      if (isPlainObject(localVariables)) {
        scope = { ...variables };
        for (const [name, value] of Object.entries(localVariables)) {
          scope[name] = evaluateName(value, variables);
        }
      }
    }
    if (typeof template !== 'string') {
      return undefined;
    }
    let unresolved = false;
    const result = template.replace(SUB_PLACEHOLDER, (match: string, name: string) => {
      const value = scope[name];
      if (value === undefined) {
        unresolved = true;
        return match;
      }
      return value;
    });
    return unresolved ? undefined : result.replace(/\$\{!/g, '${');
  }

  const join = expression['Fn::Join'];
  if (Array.isArray(join) && typeof join[0] === 'string' && Array.isArray(join[1])) {
    const delimiter = join[0];
    const parts = join[1].map(part => evaluateName(part, variables));
    return parts.every((part): part is string => part !== undefined) ? parts.join(delimiter) : undefined;
  }

  return undefined;
}

function collectImportExpressions(node: unknown, found: unknown[]): void {
  if (Array.isArray(node)) {
    node.forEach(item => collectImportExpressions(item, found));
    return;
  }
  if (!isPlainObject(node)) {
    return;
  }
  for (const [key, value] of Object.entries(node)) {
    if (key === 'Fn::ImportValue') {
      found.push(value);
    } else {
      collectImportExpressions(value, found);
    }
  }
}

/**
 * Logical IDs referenced through Ref, Fn::GetAtt and Fn::Sub placeholders.
 */
export function collectReferences(node: unknown, found: Set<string> = new Set()): Set<string> {
  if (Array.isArray(node)) {
    node.forEach(item => collectReferences(item, found));
    return found;
  }
  if (!isPlainObject(node)) {
    return found;
  }

  for (const [key, value] of Object.entries(node)) {
    if (key === 'Ref' && typeof value === 'string') {
      found.add(value);
    } else if (key === 'Fn::GetAtt') {
      if (Array.isArray(value) && typeof value[0] === 'string') {
        found.add(value[0]);
      } else if (typeof value === 'string') {
        found.add(value.split('.')[0]);
      }
    } else if (key === 'Fn::Sub') {
      const [text, localVariables] = Array.isArray(value) ? value : [value, undefined];
      const local = isPlainObject(localVariables) ? localVariables : {};
      if (typeof text === 'string') {
        for (const match of text.matchAll(SUB_PLACEHOLDER)) {
          const name = match[1].split('.')[0];
          if (!(name in local)) {
            found.add(name);
          }
        }
      }
      collectReferences(local, found);
    } else {
      collectReferences(value, found);
    }
  }

  return found;
}

/**
 * Resource declarations with their intra-template dependency edges.
 */
export function analyzeResources(template: CloudFormationTemplate): { resources: ResourceDeclaration[]; errors: string[] } {
  const resourceIds = new Set(Object.keys(template.Resources));
  const parameterIds = new Set(Object.keys(template.Parameters ?? {}));
  const errors: string[] = [];

  const resources = Object.entries(template.Resources).map(([logicalId, resource]) => {
    const explicit = resource.DependsOn === undefined
      ? []
      : Array.isArray(resource.DependsOn) ? resource.DependsOn : [resource.DependsOn];
    const dependsOn = new Set<string>();

    for (const dependency of explicit) {
      if (!resourceIds.has(dependency)) {
        errors.push(`Resource ${logicalId} depends on unknown resource ${dependency}`);
      } else {
        dependsOn.add(dependency);
      }
    }

    for (const reference of collectReferences(resource.Properties ?? {})) {
      if (resourceIds.has(reference)) {
        dependsOn.add(reference);
      } else if (!parameterIds.has(reference) && !PSEUDO_PARAMETER.test(reference)) {
        errors.push(`Resource ${logicalId} references unknown name ${reference}`);
      }
    }

    if (dependsOn.has(logicalId)) {
      errors.push(`Resource ${logicalId} references itself`);
      dependsOn.delete(logicalId);
    }

    return {
      logicalId,
      type: resource.Type,
      properties: resource.Properties ?? {},
      dependsOn: [...dependsOn]
    };
  });

  const { hasCycle, cycleNodes } = detectCycle({
    graph: buildGraph({ nodes: resources.map(resource => ({ id: resource.logicalId, dependsOn: resource.dependsOn })) })
  });
  if (hasCycle) {
    errors.push(`Circular dependency between resources: ${cycleNodes.join(' -> ')}`);
  }

  return { resources, errors };
}

/**
 * Extract the cross-stack interface (exports and imports) and resource graph of a template.
 */
export function analyzeTemplate(template: CloudFormationTemplate, context: AnalysisContext): TemplateAnalysis {
  const parameters = effectiveParameters(template, context.parameters);
  const variables: Record<string, string | undefined> = {
    ...parameters,
    'AWS::StackName': context.stackName,
    'AWS::Region': context.region
  };
  const warnings: string[] = [];

  const exports: string[] = [];
  for (const [name, output] of Object.entries(template.Outputs ?? {})) {
    if (!output.Export) {
      continue;
    }
    const exportName = evaluateName(output.Export.Name, variables);
    if (exportName === undefined) {
      warnings.push(`Export name of output ${name} cannot be evaluated before deployment`);
    } else {
      exports.push(exportName);
    }
  }

  const importExpressions: unknown[] = [];
  collectImportExpressions(template.Resources, importExpressions);
  collectImportExpressions(template.Outputs ?? {}, importExpressions);

  const imports = new Set<string>();
  for (const expression of importExpressions) {
    const importName = evaluateName(expression, variables);
    if (importName === undefined) {
      warnings.push(`Import ${JSON.stringify(expression)} cannot be evaluated before deployment`);
    } else {
      imports.add(importName);
    }
  }

  const { resources, errors } = analyzeResources(template);

  return {
    parameters,
    resources,
    exports,
    imports: [...imports],
    errors,
    warnings
  };
}
