// Template-specific types
import type { BuiltinTemplateKind } from '../types/index.js';

export interface TemplateParameter {
  Type: string;
  Default?: string | number;
  Description?: string;
  NoEcho?: boolean;
  AllowedValues?: Array<string | number>;
}

export interface TemplateResource {
  Type: string;
  Properties?: Record<string, unknown>;
  DependsOn?: string | string[];
  Condition?: string;
  DeletionPolicy?: string;
}

export interface TemplateOutput {
  Description?: string;
  Value: unknown;
  Export?: { Name: unknown };
}

export interface CloudFormationTemplate {
  AWSTemplateFormatVersion: string;
  Description?: string;
  Parameters?: Record<string, TemplateParameter>;
  Conditions?: Record<string, unknown>;
  Mappings?: Record<string, unknown>;
  Resources: Record<string, TemplateResource>;
  Outputs?: Record<string, TemplateOutput>;
}

export interface GeneratorContext {
  /** Stack name of the stage that deploys each built-in kind, used as cross-stack parameter defaults */
  stackNames: Partial<Record<BuiltinTemplateKind, string>>;
}

export interface TemplateGenerator {
  generate(kind: BuiltinTemplateKind, context: GeneratorContext): CloudFormationTemplate;
}

export interface LoadedTemplate {
  source: string;
  /** Sections the analyzer reads */
  document: CloudFormationTemplate;
  /** Template as parsed, every section kept */
  raw: object;
  body: string;
  hash: string;
}
