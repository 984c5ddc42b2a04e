import Joi from 'joi';
import { Capability, ProjectConfig, StageConfig } from '../types/index.js';
import { ConfigValidationResult } from './types.js';
import { isPlainObject } from '../utils/objects.js';

type ParameterValue = string | number | boolean;

interface RawStageConfig extends Omit<StageConfig, 'parameters'> {
  parameters?: Record<string, ParameterValue>;
}

interface RawProjectConfig extends Omit<ProjectConfig, 'stages'> {
  stages: RawStageConfig[];
}

const TEMPLATE_REFERENCE_PATTERN = /^(builtin:(network|container|service|pipeline)|.+\.(ya?ml|json|template))$/;

const CAPABILITIES: Capability[] = ['CAPABILITY_IAM', 'CAPABILITY_NAMED_IAM', 'CAPABILITY_AUTO_EXPAND'];

const stageNameSchema = Joi.string()
  .pattern(/^[a-zA-Z][a-zA-Z0-9-]*$/)
  .max(64)
  .messages({
    'string.pattern.base': 'Stage name must start with a letter and contain only alphanumeric characters and hyphens'
  });

const tagsSchema = Joi.object()
  .pattern(Joi.string(), Joi.string().allow(''))
  .messages({
    'object.pattern.match': 'Tags must be key-value pairs of strings'
  });

const projectInfoSchema = Joi.object({
  name: Joi.string()
    .required()
    .pattern(/^[a-zA-Z0-9-_]+$/)
    .min(1)
    .max(50)
    .messages({
      'string.pattern.base': 'Project name must contain only alphanumeric characters, hyphens, and underscores',
      'string.max': 'Project name must be no more than 50 characters long'
    }),
  environment: Joi.string()
    .pattern(/^[a-zA-Z0-9-]+$/)
    .optional()
    .messages({
      'string.pattern.base': 'Environment must contain only alphanumeric characters and hyphens'
    })
});

const awsConfigSchema = Joi.object({
  region: Joi.string()
    .pattern(/^[a-z]{2}(-[a-z]+)+-\d$/)
    .default('us-east-1')
    .messages({
      'string.pattern.base': 'AWS region must be a valid region identifier (e.g., us-east-1)'
    }),
  profile: Joi.string().optional()
});

const settingsSchema = Joi.object({
  state_file: Joi.string().default('.stackctl/state.json'),
  stack_prefix: Joi.string()
    .pattern(/^[a-zA-Z][a-zA-Z0-9-]*$/)
    .allow('')
    .optional()
    .messages({
      'string.pattern.base': 'Stack prefix must start with a letter and contain only alphanumeric characters and hyphens'
    }),
  poll_interval_seconds: Joi.number()
    .min(1)
    .max(300)
    .default(10)
    .messages({
      'number.min': 'Poll interval must be at least 1 second',
      'number.max': 'Poll interval must be no more than 300 seconds'
    }),
  timeout_minutes: Joi.number()
    .integer()
    .min(1)
    .max(720)
    .default(30)
    .messages({
      'number.min': 'Timeout must be at least 1 minute',
      'number.max': 'Timeout must be no more than 720 minutes (12 hours)'
    }),
  tags: tagsSchema.optional()
});

const stageSchema = Joi.object({
  name: stageNameSchema.required(),
  template: Joi.string()
    .pattern(TEMPLATE_REFERENCE_PATTERN)
    .required()
    .messages({
      'string.pattern.base': 'Template must be builtin:network|container|service|pipeline or a .yml, .yaml, .json or .template file'
    }),
  parameters: Joi.object()
    .pattern(Joi.string(), Joi.alternatives().try(Joi.string().allow(''), Joi.number(), Joi.boolean()))
    .optional()
    .messages({
      'object.pattern.match': 'Parameters must be key-value pairs of scalar values'
    }),
  capabilities: Joi.array()
    .items(Joi.string().valid(...CAPABILITIES))
    .unique()
    .optional()
    .messages({
      'any.only': `Capabilities must be one of: ${CAPABILITIES.join(', ')}`
    }),
  depends_on: Joi.array().items(stageNameSchema).unique().optional(),
  imports: Joi.array().items(Joi.string().min(1)).unique().optional(),
  exports: Joi.array().items(Joi.string().min(1)).unique().optional(),
  tags: tagsSchema.optional()
});

const projectConfigSchema = Joi.object<RawProjectConfig>({
  project: projectInfoSchema.required(),
  aws: awsConfigSchema.required(),
  settings: settingsSchema.required(),
  stages: Joi.array()
    .items(stageSchema)
    .min(1)
    .unique('name')
    .required()
    .messages({
      'array.min': 'At least one stage must be declared',
      'array.unique': 'Stage names must be unique'
    })
}).unknown(false);

function checkStageReferences(config: RawProjectConfig): string[] {
  const errors: string[] = [];
  const names = new Set(config.stages.map(stage => stage.name));

  for (const stage of config.stages) {
    for (const dependency of stage.depends_on ?? []) {
      if (dependency === stage.name) {
        errors.push(`Stage ${stage.name} cannot depend on itself`);
      } else if (!names.has(dependency)) {
        errors.push(`Stage ${stage.name} depends on unknown stage ${dependency}`);
      }
    }
  }

  return errors;
}

function runValidation(config: unknown): { errors: string[]; value?: RawProjectConfig } {
  const configWithDefaults = isPlainObject(config)
    ? { ...config, aws: config.aws ?? {}, settings: config.settings ?? {} }
    : config;

  const { error, value } = projectConfigSchema.validate(configWithDefaults, {
    abortEarly: false,
    allowUnknown: false,
    stripUnknown: false
  });

  if (error) {
    return { errors: error.details.map(detail => detail.message) };
  }

  const referenceErrors = checkStageReferences(value);
  if (referenceErrors.length > 0) {
    return { errors: referenceErrors };
  }

  return { errors: [], value };
}

function normalizeParameters(parameters: Record<string, ParameterValue> | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(parameters ?? {})) {
    result[key] = String(value);
  }
  return result;
}

/**
 * Validates a project configuration object against the schema
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { errors } = runValidation(config);
  return {
    valid: errors.length === 0,
    errors
  };
}

/**
 * Validates and normalizes a project configuration. Parameter values are converted to strings,
 * which is how CloudFormation receives them.
 * @throws Error if validation fails
 */
export function validateAndNormalizeConfig(config: unknown): ProjectConfig {
  const { errors, value } = runValidation(config);

  if (!value) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return {
    ...value,
    stages: value.stages.map(stage => ({
      ...stage,
      parameters: normalizeParameters(stage.parameters)
    }))
  };
}

export function getConfigSchema(): Joi.ObjectSchema<RawProjectConfig> {
  return projectConfigSchema;
}
