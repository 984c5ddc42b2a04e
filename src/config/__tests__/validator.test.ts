import { describe, it, expect } from 'vitest';
import { validateConfig, validateAndNormalizeConfig, getConfigSchema } from '../validator.js';

const baseConfig = () => ({
  project: { name: 'shop', environment: 'staging' },
  aws: { region: 'eu-west-1' },
  settings: { state_file: '.stackctl/state.json', poll_interval_seconds: 5, timeout_minutes: 30 },
  stages: [
    { name: 'network', template: 'builtin:network' },
    { name: 'container', template: 'builtin:container', parameters: { NetworkStackName: '${stack:network}' } }
  ]
});

describe('Configuration Validator', () => {
  describe('validateConfig', () => {
    it('should accept a complete project configuration', () => {
      const result = validateConfig(baseConfig());

      expect(result.valid).toBe(true);
      expect(result.errors).toEqual([]);
    });

    it('should fill in aws and settings sections when they are missing', () => {
      const { aws, settings, ...rest } = baseConfig();

      const result = validateConfig(rest);

      expect(result.valid).toBe(true);
    });

    it('should reject a project name with invalid characters', () => {
      const config = { ...baseConfig(), project: { name: 'my shop!' } };

      const result = validateConfig(config);

      expect(result.valid).toBe(false);
      expect(result.errors).toContain('Project name must contain only alphanumeric characters, hyphens, and underscores');
    });

    it('should reject an invalid region', () => {
      const config = { ...baseConfig(), aws: { region: 'useast1' } };

      const result = validateConfig(config);

      expect(result.errors).toContain('AWS region must be a valid region identifier (e.g., us-east-1)');
    });

    it('should require at least one stage', () => {
      const config = { ...baseConfig(), stages: [] };

      const result = validateConfig(config);

      expect(result.errors).toContain('At least one stage must be declared');
    });

    it('should reject duplicate stage names', () => {
      const config = {
        ...baseConfig(),
        stages: [
          { name: 'network', template: 'builtin:network' },
          { name: 'network', template: 'templates/network.yml' }
        ]
      };

      const result = validateConfig(config);

      expect(result.errors).toContain('Stage names must be unique');
    });

    it('should reject templates that are neither built-in nor template files', () => {
      const config = { ...baseConfig(), stages: [{ name: 'network', template: 'network.txt' }] };

      const result = validateConfig(config);

      expect(result.errors).toContain(
        'Template must be builtin:network|container|service|pipeline or a .yml, .yaml, .json or .template file'
      );
    });

    it('should accept template files in every supported format', () => {
      for (const template of ['stacks/vpc.yml', 'stacks/vpc.yaml', 'vpc.json', 'vpc.template']) {
        const config = { ...baseConfig(), stages: [{ name: 'network', template }] };
        expect(validateConfig(config).valid).toBe(true);
      }
    });

    it('should reject depends_on entries naming unknown stages', () => {
      const config = {
        ...baseConfig(),
        stages: [{ name: 'service', template: 'builtin:service', depends_on: ['database'] }]
      };

      const result = validateConfig(config);

      expect(result.errors).toEqual(['Stage service depends on unknown stage database']);
    });

    it('should reject a stage depending on itself', () => {
      const config = {
        ...baseConfig(),
        stages: [{ name: 'service', template: 'builtin:service', depends_on: ['service'] }]
      };

      const result = validateConfig(config);

      expect(result.errors).toEqual(['Stage service cannot depend on itself']);
    });

    it('should reject unknown top-level keys', () => {
      const config = { ...baseConfig(), deployment: { stack_name: 'legacy' } };

      const result = validateConfig(config);

      expect(result.errors).toContain('"deployment" is not allowed');
    });

    it('should reject a poll interval below one second', () => {
      const config = { ...baseConfig(), settings: { poll_interval_seconds: 0 } };

      const result = validateConfig(config);

      expect(result.errors).toEqual(['Poll interval must be at least 1 second']);
    });

    it('should reject a timeout above twelve hours', () => {
      const config = { ...baseConfig(), settings: { timeout_minutes: 721 } };

      const result = validateConfig(config);

      expect(result.errors).toContain('Timeout must be no more than 720 minutes (12 hours)');
    });
  });

  describe('validateAndNormalizeConfig', () => {
    it('should convert parameter values to strings', () => {
      const config = {
        ...baseConfig(),
        stages: [{
          name: 'service',
          template: 'builtin:service',
          parameters: { ContainerPort: 8080, DesiredCount: 2, ServiceName: 'web', Public: true }
        }]
      };

      const result = validateAndNormalizeConfig(config);

      expect(result.stages[0].parameters).toEqual({
        ContainerPort: '8080',
        DesiredCount: '2',
        ServiceName: 'web',
        Public: 'true'
      });
    });

    it('should apply schema defaults', () => {
      const { aws, settings, ...rest } = baseConfig();

      const result = validateAndNormalizeConfig(rest);

      expect(result.aws.region).toBe('us-east-1');
      expect(result.settings.state_file).toBe('.stackctl/state.json');
      expect(result.settings.poll_interval_seconds).toBe(10);
      expect(result.settings.timeout_minutes).toBe(30);
    });

    it('should give stages without parameters an empty parameter map', () => {
      const result = validateAndNormalizeConfig(baseConfig());

      expect(result.stages[0].parameters).toEqual({});
    });

    it('should throw with every validation error listed', () => {
      const config = { ...baseConfig(), project: { name: 'bad name' }, stages: [] };

      expect(() => validateAndNormalizeConfig(config)).toThrow(
        'Configuration validation failed:\nProject name must contain only alphanumeric characters, hyphens, and underscores\nAt least one stage must be declared'
      );
    });
  });

  describe('getConfigSchema', () => {
    it('should expose the Joi schema', () => {
      const schema = getConfigSchema();

      expect(schema.describe().type).toBe('object');
    });
  });
});
