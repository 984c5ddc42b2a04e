import { describe, it, expect, beforeEach } from 'vitest';
import { StackNamingService, createNamingService } from '../naming.js';
import { ProjectConfig, StageConfig } from '../../types/index.js';
import { StackctlError } from '../../errors/index.js';

const projectConfig = (prefix?: string): ProjectConfig => ({
  project: { name: 'shop' },
  aws: { region: 'us-east-1' },
  settings: {
    state_file: '.stackctl/state.json',
    poll_interval_seconds: 10,
    timeout_minutes: 30,
    ...(prefix !== undefined && { stack_prefix: prefix })
  },
  stages: [
    { name: 'network', template: 'builtin:network' },
    { name: 'container', template: 'builtin:container' }
  ]
});

describe('StackNamingService', () => {
  let naming: StackNamingService;

  beforeEach(() => {
    naming = createNamingService();
  });

  describe('generateStackNames', () => {
    it('should use the stage name when there is no prefix', () => {
      const names = naming.generateStackNames(projectConfig());

      expect([...names.entries()]).toEqual([
        ['network', 'network'],
        ['container', 'container']
      ]);
    });

    it('should prepend the stack prefix', () => {
      const names = naming.generateStackNames(projectConfig('shop-prod'));

      expect(names.get('network')).toBe('shop-prod-network');
      expect(names.get('container')).toBe('shop-prod-container');
    });

    it('should ignore an empty prefix', () => {
      const names = naming.generateStackNames(projectConfig(''));

      expect(names.get('network')).toBe('network');
    });
  });

  describe('generateStackName', () => {
    it('should replace invalid characters and collapse hyphens', () => {
      expect(naming.generateStackName({ stageName: 'web_app..v2', prefix: 'team' })).toBe('team-web-app-v2');
    });

    it('should make sure the name starts with a letter', () => {
      expect(naming.generateStackName({ stageName: '2024-network' })).toBe('stack-2024-network');
    });

    it('should fall back to a fixed name when nothing valid remains', () => {
      expect(naming.generateStackName({ stageName: '___' })).toBe('stack');
    });

    it('should truncate long names to 128 characters and keep them distinct', () => {
      const first = naming.generateStackName({ stageName: 'a'.repeat(140) });
      const second = naming.generateStackName({ stageName: 'a'.repeat(141) });

      expect(first.length).toBeLessThanOrEqual(128);
      expect(second.length).toBeLessThanOrEqual(128);
      expect(first.startsWith('a'.repeat(100))).toBe(true);
      expect(first).not.toBe(second);
    });
  });

  describe('toStackPrefix', () => {
    it('should turn a project name into a valid prefix', () => {
      expect(naming.toStackPrefix('my_app')).toBe('my-app');
      expect(naming.toStackPrefix('shop')).toBe('shop');
    });
  });

  describe('resolveStackReferences', () => {
    const stackNames = new Map([
      ['network', 'shop-network'],
      ['container', 'shop-container']
    ]);

    it('should replace stack references with stack names', () => {
      const stage: StageConfig = {
        name: 'service',
        template: 'builtin:service',
        parameters: {
          NetworkStackName: '${stack:network}',
          ContainerStackName: '${stack:container}',
          ServiceName: 'web'
        }
      };

      expect(naming.resolveStackReferences(stage, stackNames)).toEqual({
        NetworkStackName: 'shop-network',
        ContainerStackName: 'shop-container',
        ServiceName: 'web'
      });
    });

    it('should replace references embedded in longer values', () => {
      const stage: StageConfig = {
        name: 'service',
        template: 'service.yml',
        parameters: { Description: 'uses ${stack:network} and ${stack:container}' }
      };

      expect(naming.resolveStackReferences(stage, stackNames)).toEqual({
        Description: 'uses shop-network and shop-container'
      });
    });

    it('should return an empty map for a stage without parameters', () => {
      const stage: StageConfig = { name: 'network', template: 'builtin:network' };

      expect(naming.resolveStackReferences(stage, stackNames)).toEqual({});
    });

    it('should reject references to unknown stages', () => {
      const stage: StageConfig = {
        name: 'service',
        template: 'builtin:service',
        parameters: { NetworkStackName: '${stack:vpc}' }
      };

      expect(() => naming.resolveStackReferences(stage, stackNames)).toThrow(StackctlError);
      expect(() => naming.resolveStackReferences(stage, stackNames)).toThrow(
        'Parameter NetworkStackName of stage service references unknown stage vpc'
      );
    });
  });
});
